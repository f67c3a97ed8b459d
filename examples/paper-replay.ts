/**
 * Paper Replay Example
 *
 * Replays a synthetic ETH/USDC price path through the strategy described in
 * strategies/ema-threshold.json:
 * - Smooths the pool price with an EMA (carry 0.8)
 * - Buys 5 when the smoothed price is at or below 1850, sells 5/2 at or above 1950
 * - Fills every intent on a PaperTradeExecutor and prints the receipts
 *
 * TICKWISE_* environment variables apply; TICKWISE_STRATEGY_PATH overrides the file.
 */

import { fileURLToPath } from "node:url";
import {
	PaperTradeExecutor,
	ReplayFeed,
	TradingLoop,
	createLogger,
	describeTrade,
	envOr,
	loadStrategyFile,
	resolveConfig,
} from "../src/index.js";

const defaultPath = fileURLToPath(new URL("./strategies/ema-threshold.json", import.meta.url));

const prices = [
	1900, 1885, 1862, 1840, 1818, 1805, 1822, 1860, 1905, 1948, 1990, 2015, 2030, 1990, 1950, 1910,
];

async function main() {
	const config = resolveConfig({
		strategyPath: envOr("TICKWISE_STRATEGY_PATH", defaultPath),
		pollIntervalMs: 1,
	});
	const logger = createLogger({ level: config.logLevel, name: config.name });

	const strategy = await loadStrategyFile(config.strategyPath, logger);
	if (!strategy.ok) {
		console.error(strategy.error.message);
		process.exit(1);
	}

	const feed = new ReplayFeed(prices, { startBlock: 19_000_000 });
	const executor = new PaperTradeExecutor();
	const controller = new AbortController();

	const loop = new TradingLoop(
		{
			strategy: strategy.value,
			blocks: feed,
			prices: feed,
			executor,
			logger,
			sleep: async () => {
				if (!feed.advance()) controller.abort();
			},
		},
		config,
	);

	const stop = await loop.run(controller.signal);

	console.log(`\nStopped: ${stop.reason}`);
	for (const receipt of executor.receipts()) {
		const trade = describeTrade(receipt.trade).padEnd(9);
		const notional = `notional ${receipt.notional}`;
		console.log(`  block ${receipt.block}  ${trade} @ ${receipt.price}  ${notional}`);
	}
}

main().catch((err) => {
	console.error("Error:", err);
	process.exit(1);
});

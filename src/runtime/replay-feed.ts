/**
 * ReplayFeed — block and price source over a recorded price series.
 *
 * Block `startBlock + i` is priced at `prices[i]`. The head starts at the
 * first block and moves forward one block per `advance()`, so a loop polling
 * the feed sees the series exactly as if it were being mined.
 */

import { ErrorCategory, PriceSourceError } from "../shared/errors.js";
import type { EngineError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { BlockSource, PriceSource } from "./types.js";

export interface ReplayFeedOptions {
	/** Number of the first replayed block. Default: 1 */
	readonly startBlock?: number | undefined;
}

export class ReplayFeed implements BlockSource, PriceSource {
	readonly startBlock: number;
	private readonly prices: readonly number[];
	private head: number;

	constructor(prices: readonly number[], options: ReplayFeedOptions = {}) {
		const startBlock = options.startBlock ?? 1;
		if (!Number.isSafeInteger(startBlock) || startBlock < 0) {
			throw new RangeError(`startBlock must be a non-negative integer, got ${startBlock}`);
		}
		if (prices.length === 0) {
			throw new RangeError("ReplayFeed needs at least one price");
		}
		this.prices = [...prices];
		this.startBlock = startBlock;
		this.head = startBlock;
	}

	get endBlock(): number {
		return this.startBlock + this.prices.length - 1;
	}

	get headBlock(): number {
		return this.head;
	}

	/** Mines the next block. Returns false once the series is exhausted. */
	advance(): boolean {
		if (this.head >= this.endBlock) return false;
		this.head++;
		return true;
	}

	isExhausted(): boolean {
		return this.head >= this.endBlock;
	}

	async latestBlock(): Promise<Result<number, EngineError>> {
		return ok(this.head);
	}

	async priceAt(block: number): Promise<Result<number, EngineError>> {
		const price = Number.isInteger(block) ? this.prices[block - this.startBlock] : undefined;
		if (price === undefined) {
			return err(
				new PriceSourceError(
					`No replayed price for block ${block} (range ${this.startBlock}..${this.endBlock})`,
					ErrorCategory.NonRetryable,
					{ block, startBlock: this.startBlock, endBlock: this.endBlock },
				),
			);
		}
		if (block > this.head) {
			return err(
				new PriceSourceError(
					`Block ${block} is ahead of the head ${this.head}`,
					ErrorCategory.Retryable,
					{ block, head: this.head },
				),
			);
		}
		return ok(price);
	}
}

/**
 * Branded ids for the three keys the engine juggles: the market a pair of
 * outcome tokens belongs to, the token a position is keyed by, and the fill
 * the cursor deduplicates on. All three are plain trimmed strings at run time.
 */

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** Condition id; owns a complementary pair of outcome tokens */
export type MarketId = Brand<string, "MarketId">;
/** Outcome token id; positions are keyed by this */
export type TokenId = Brand<string, "TokenId">;
/** Feed-assigned fill id (the transaction hash for on-chain fills) */
export type FillId = Brand<string, "FillId">;

/** @throws Error when the value is blank */
function idFactory<B extends string>(label: B): (value: string) => Brand<string, B> {
	return (value) => {
		const trimmed = value.trim();
		if (trimmed.length === 0) {
			throw new Error(`${label} cannot be empty`);
		}
		return trimmed as Brand<string, B>;
	};
}

export const marketId: (value: string) => MarketId = idFactory("MarketId");
export const tokenId: (value: string) => TokenId = idFactory("TokenId");
export const fillId: (value: string) => FillId = idFactory("FillId");

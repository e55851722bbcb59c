import type { AccountBalance } from "@lipa/core";
import type { LipaContext } from "../context/context.js";

export async function getBalance(
	ctx: LipaContext,
	options: { signal?: AbortSignal } = {},
): Promise<AccountBalance[]> {
	const balances = await ctx.gateway.getBalance(options);
	ctx.logger.debug("Account balance retrieved", {
		balances: balances.map((entry) => `${entry.currency} ${entry.balance}`),
	});
	return balances;
}

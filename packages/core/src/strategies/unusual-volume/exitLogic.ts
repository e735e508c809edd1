import type { OptionQuote, Position } from "../../types";
import {
	EXIT_PROFIT_TARGET,
	EXIT_STOP_LOSS,
	unrealizedChangePct,
} from "../liquidity-momentum/exitLogic";
import type { UnusualVolumeConfig } from "./config";

export const evaluateUnusualVolumeExit = (
	position: Position,
	quote: OptionQuote,
	config: UnusualVolumeConfig
): string | null => {
	const changePct = unrealizedChangePct(position, quote);
	if (changePct === null) {
		return null;
	}
	if (changePct >= config.profitTargetPct) {
		return EXIT_PROFIT_TARGET;
	}
	if (changePct <= config.stopLossPct) {
		return EXIT_STOP_LOSS;
	}
	return null;
};

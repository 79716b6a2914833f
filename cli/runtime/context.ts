import type { RunConfig } from "../types.ts";
import { getArtifactPaths, getRunStem } from "../utils/artifact-naming.ts";
import type { RunContext } from "./types.ts";

export function getRunContext(config: Pick<RunConfig, "outputDir" | "runIndex" | "runCount">): RunContext
{
	const stem = getRunStem(config.outputDir, config.runIndex, config.runCount);

	return {
		runIndex: config.runIndex,
		runCount: config.runCount,
		stem,
		paths: getArtifactPaths(stem),
	};
}

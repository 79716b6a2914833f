// --- Types ---
export type FailureFilter = "crash" | "anr";

export type RunStatus = "clean" | "failed";

export interface StressConfig
{
	events: number;
	packages: string[];
	filter?: FailureFilter;
	matchDescription?: string;
}

export interface Timings
{
	bootPollMs: number;
	settleMs: number;
	chargePollMs: number;
}

export interface CampaignConfig extends StressConfig
{
	outputDir: string;
	runs: number;
	batteryThreshold: number;
	logcatFilter: string[];
	reportCommand: string[];
	timings: Timings;
}

export interface RunConfig extends StressConfig
{
	outputDir: string;
	runIndex: number;
	runCount: number;
}

export interface ArtifactPaths
{
	monkey: string;
	logcat: string;
	bugreport: string;
	report: string;
}

export interface RunResult
{
	readonly index: number;
	readonly status: RunStatus;
	readonly artifacts: Readonly<ArtifactPaths>;
	readonly failure?: string;
	readonly reportError?: string;
	readonly startedAt: string;
	readonly durationMs: number;
}

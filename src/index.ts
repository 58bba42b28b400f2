export { ManualClock, systemClock, type Clock } from "./core/clock.js";
export * from "./core/errors.js";
export { pollUntil, type PollConfig, type PollResult, type PollTick, type TickResult } from "./core/poll-until.js";
export { classify, isTerminalOutcome, OutcomeLatch, type Outcome } from "./core/status-classifier.js";
export { nextState, isTerminal, type ConvergeState, type TerminalState } from "./core/state-machine.js";
export { runBuildStep, type BuildStepResult } from "./core/steps/build.js";
export { runDeployStep, type DeployStepResult } from "./core/steps/deploy.js";
export { Orchestrator, pollConfigs, type OrchestratorResult, type OrchestratorSettings } from "./core/orchestrator.js";
export { StreamReporter, MemoryReporter, type Reporter, type ProgressEvent } from "./core/reporter.js";
export { RunJournal, type RunRecord } from "./core/journal.js";
export type { RemoteControlClient, BuildRecord, BuildHandle, Revision } from "./remote/client.js";
export { NorthflankCliClient, type CommandRunner } from "./remote/northflank-cli.js";
export { GitRevisionSource, GitPushPublisher, type RevisionSource, type Publisher } from "./git/revision-source.js";
export { converge, type ConvergeResult } from "./commands/converge.js";

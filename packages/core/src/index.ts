// Pipeline
export { runQcPipeline, planSamples, planInvocations, PIPELINE_VERSION } from './core/pipeline';
export type { PipelineOptions, PipelineRun, PlannedInvocation } from './core/pipeline';
export { BatchOrchestrator, summarizeOutcomes } from './core/batch-orchestrator';
export type { OrchestratorHooks, OutcomeCounts } from './core/batch-orchestrator';
export { SampleProcessor, failureOutcome, cancelledOutcome } from './core/sample-processor';
export type { SampleRunner } from './core/sample-processor';
export { createRunConfig, parseIntegerOption, threadsPerSample } from './core/run-config';
export { prepareOutputDirectories, getOutputDirectories, getSummaryPath } from './core/output-layout';

// Discovery and naming
export { discoverInputFiles, assertUniqueSampleIds, isFastqFileName } from './discovery/file-discovery';
export type { DiscoveryOptions } from './discovery/file-discovery';
export { deriveSampleId, createSample } from './discovery/sample-naming';

// Engine
export { buildEngineArguments, findMetricsPath, formatCommandLine, ENGINE_FLAGS } from './engine/engine-arguments';
export { parseEngineMetrics, extractReadMetrics } from './engine/metrics-parser';
export type { MetricsParseResult } from './engine/metrics-parser';
export { FastpEngine, createProcessingEngine } from './engine/fastp-engine';

// Reporting
export { formatBatchSummary, writeBatchSummary, formatLocalTime } from './reporting/summary-reporter';
export type { SummaryOptions } from './reporting/summary-reporter';

// Presets
export { RUN_PRESETS, getPreset, mergePresetValues } from './presets/presets';
export { ADAPTER_PLATFORMS, BUILT_IN_ADAPTERS, formatAdapterFasta } from './presets/adapters';
export type { AdapterPlatform, AdapterSequence } from './presets/adapters';

// Types
export * from './types/config.types';
export * from './types/sample.types';
export * from './types/engine.types';

// Errors
export {
  PipelineError, ConfigurationError, EngineUnavailableError, DiscoveryError, NoInputFilesError,
  DuplicateSampleError, EngineStartError, MetricsParseWarning,
} from './errors';

// Utilities
export { loadEnvironmentFile, resolveEngineCommand, ENGINE_ENV_VAR, DEFAULT_ENGINE_COMMAND } from './utils/env-loader';
export { numOrUndefined, getErrorMessage, getErrorCode, isRecord, writeFileWithDirectories } from './utils/common';
export {
  EXIT_GENERAL_ERROR, EXIT_INVALID_ARGS, EXIT_ENGINE_UNAVAILABLE, EXIT_CONFIG_ERROR,
  EXIT_NO_INPUT, EXIT_SAMPLE_FAILURES, EXIT_INTERRUPTED, exitCodeOf,
} from './utils/exit-codes';
export type { ErrorWithCode } from './utils/exit-codes';
export { logInfo, logSuccess, logWarning, logError, writeStderr, formatMessage, MessageType, MESSAGE_ICONS } from './utils/console';
export { Logger } from './utils/logger';

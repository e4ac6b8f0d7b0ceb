export {
  CONFIG_FILE_NAME,
  CROSS_ORIGIN_ISOLATION_HEADERS,
  DEFAULT_TARGET,
  artifactPath,
  configInputSchema,
  loadConfig,
  parseConfigInput,
  readConfigFile,
  resolveConfig,
} from './config.js';
export type {
  DevLoopConfig,
  DevLoopConfigInput,
  LoadConfigOptions,
  ServeConfig,
  ServeMode,
  ToolCommands,
} from './config.js';

export {
  BindingGenerationFailure,
  BuildFailure,
  ConfigError,
  ServerLaunchFailure,
  StagingFailure,
  StepError,
} from './errors.js';
export type { StepErrorOptions, StepName } from './errors.js';

export { Logger, isLogLevel, silentLogger } from './logger.js';
export type { LogContext, LogLevel, LoggerOptions, LogWriter } from './logger.js';

export { ProcessCommandRunner, formatCommand, runCommand } from './command-runner.js';
export type { CommandOptions, CommandResult, CommandRunner, RunningCommand } from './command-runner.js';

export { Pipeline } from './pipeline.js';
export type { PipelinePhase, PipelineStep, StepTiming } from './pipeline.js';

export { WasmBuilder, parseCargoLine } from './steps/build.js';
export type { BuildResult } from './steps/build.js';
export { BindgenRunner } from './steps/bindgen.js';
export type { BindgenResult } from './steps/bindgen.js';
export { stageAssets } from './steps/stage.js';
export { startServer, staticServerSession } from './steps/serve.js';
export type { ServeSession } from './steps/serve.js';

export { StaticServer } from './static-server.js';
export { isPortAvailable } from './utils/port.js';
export type { StaticServerConfig } from './static-server.js';
export { ExternalServer, serverExitCode } from './external-server.js';
export type { ExternalSession } from './external-server.js';

export { DevLoop } from './dev-loop.js';
export type { DevLoopOptions, RunOptions } from './dev-loop.js';

export { checkTools } from './doctor.js';
export type { ToolCheck } from './doctor.js';

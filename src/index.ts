/**
 * vmkit: credential resolution, session context, API invocation and result
 * shaping for vCenter, NSX Manager, vCloud Director and Terraform.
 *
 * Re-exports all public API surface from a single entry point.
 */

// ---------------------------------------------------------------------------
// Core utilities
// ---------------------------------------------------------------------------

export { type Clock, SystemClock, ManualClock } from './clock.js';
export { parseDuration, formatDuration } from './duration.js';
export {
  type Config,
  type HttpConfig,
  type TargetConfig,
  type VCloudConfig,
  type TerraformConfig,
  parseConfig,
  defaultConfig,
  DEFAULT_HTTP_CONFIG,
  DEFAULT_VCLOUD_CONFIG,
  DEFAULT_TERRAFORM_CONFIG,
} from './config.js';
export {
  ApiError,
  ConfigError,
  ConnectionError,
  CredentialFileError,
  CredentialNotFoundError,
  ParseError,
  SessionValueMissingError,
  TaskTimeoutError,
  TerraformError,
  errorMessage,
} from './errors.js';
export { debugEnabled, debugLog, warn } from './log.js';

// ---------------------------------------------------------------------------
// Credentials and session
// ---------------------------------------------------------------------------

export * from './credentials/index.js';
export { type Namespace, SessionContext, SessionScope } from './session/context.js';

// ---------------------------------------------------------------------------
// HTTP and results
// ---------------------------------------------------------------------------

export {
  type ApiRequest,
  type ApiResponse,
  type HttpMethod,
  DEFAULT_TIMEOUT_MS,
  basicAuth,
  invokeApi,
  joinUrl,
  normalizeBaseUrl,
  parseMethod,
} from './http/invoker.js';
export {
  type ResultFormat,
  type ShapeOptions,
  XML_ATTRIBUTE_PREFIX,
  decodeResult,
  detectFormat,
  parseJson,
  parseXml,
  shapeResult,
} from './result/shape.js';
export {
  type PollOptions,
  type PollResult,
  type TerminalStatus,
  DEFAULT_POLL_OPTIONS,
  IN_PROGRESS_STATUSES,
  TERMINAL_STATUSES,
  isTerminalStatus,
  waitForTask,
} from './tasks/poll.js';

// ---------------------------------------------------------------------------
// Targets
// ---------------------------------------------------------------------------

export { type RequestOptions, type TransportOptions, TargetClient } from './targets/target.js';
export {
  type VmFilter,
  type VmInfo,
  type VmSummary,
  VCenterClient,
  VmInfoSchema,
  VmSummarySchema,
} from './targets/vcenter.js';
export { type NodeInfo, type Segment, NsxClient, NodeInfoSchema, SegmentSchema } from './targets/nsx.js';
export {
  type PowerAction,
  type VCloudConnectOptions,
  type VCloudTask,
  type VCloudVmRecord,
  DEFAULT_API_VERSION,
  VCloudClient,
  parseTask,
  parseVmRecords,
} from './targets/vcloud.js';
export {
  type TerraformCommand,
  type TerraformOptions,
  type TerraformRun,
  type TerraformVars,
  TERRAFORM_COMMANDS,
  buildVarArgs,
  parseTerraformCommand,
  parseVars,
  runTerraform,
  terraformArgs,
} from './targets/terraform.js';

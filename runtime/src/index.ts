export {
  ACTION_KINDS,
  PHASE_FAULT_TYPES,
  describeAction,
  isPhaseFaultType
} from "./actions.ts";
export type {
  Action,
  ActionKind,
  AndAction,
  ComparePresenceAction,
  CompareVpdAction,
  I2CCompareBitAction,
  I2CCompareByteAction,
  I2CCompareBytesAction,
  I2CWriteBitAction,
  I2CWriteByteAction,
  I2CWriteBytesAction,
  IfAction,
  LogPhaseFaultAction,
  NotAction,
  OrAction,
  PhaseFaultType,
  PMBusReadSensorAction,
  PMBusWriteVoutCommandAction,
  RunRuleAction,
  SetDeviceAction
} from "./actions.ts";
export { executeAction, executeActions, executeRule } from "./action-executor.ts";
export { DeglitchCounter } from "./deglitch.ts";
export { findError, getErrors, getMessages } from "./error-chain.ts";
export { ErrorHistory, classifyError, reportError } from "./error-reporting.ts";
export type { ErrorClassification, ReportErrorOptions } from "./error-reporting.ts";
export {
  ActionError,
  ConfigFileParserError,
  I2CError,
  IdNotFoundError,
  InvalidConfigurationError,
  PMBusError,
  RuleDepthError,
  WriteVerificationError
} from "./errors.ts";
export type { IdCategory } from "./errors.ts";
export { ExecutionContext, MAX_RULE_DEPTH } from "./execution-context.ts";
export { formatHexByte, formatHexByteList, formatHexWord } from "./hex.ts";
export { I2CInterface } from "./i2c-interface.ts";
export type { I2CTransport } from "./i2c-interface.ts";
export { IdMap, createIdMap } from "./id-map.ts";
export {
  JOURNAL_ENTRY_SCHEMA_VERSION,
  createJsonlErrorLogging,
  createJsonlJournal
} from "./journal.ts";
export type {
  ErrorLogRecordV0,
  JournalEntryV0,
  JsonlErrorLoggingOptions,
  JsonlJournalOptions
} from "./journal.ts";
export {
  SENSOR_DATA_FORMATS,
  SENSOR_TYPES,
  VOUT_COMMAND,
  VOUT_DATA_FORMATS,
  VOUT_MODE,
  convertFromLinear,
  convertFromVoutLinear,
  convertToVoutLinear,
  isSensorDataFormat,
  isSensorType,
  parseVoutMode
} from "./pmbus-utils.ts";
export type { SensorDataFormat, SensorType, VoutDataFormat, VoutMode } from "./pmbus-utils.ts";
export { ERROR_LOG_KINDS } from "./services.ts";
export type {
  ErrorLogEntry,
  ErrorLogKind,
  ErrorLogSeverity,
  ErrorLogging,
  Journal,
  JournalPriority,
  PresenceService,
  Sensors,
  Services,
  VPD
} from "./services.ts";
export {
  PHASE_FAULT_DETECTION_THRESHOLD,
  SystemMonitor,
  closeDevices,
  configureDevice,
  configureSystem,
  createSystem,
  isDevicePresent
} from "./system.ts";
export type { System } from "./system.ts";
export { expandRuleIdOrActions } from "./topology.ts";
export type {
  Chassis,
  Configuration,
  Device,
  PhaseFaultDetection,
  PresenceDetection,
  Rail,
  Rule,
  RuleIdOrActions,
  SensorMonitoring
} from "./topology.ts";

export {
  parseAction,
  parseActionArray,
  parseAnd,
  parseChassis,
  parseChassisArray,
  parseComparePresence,
  parseCompareVpd,
  parseConfigFile,
  parseConfiguration,
  parseDevice,
  parseDeviceArray,
  parseI2CCompareBit,
  parseI2CCompareByte,
  parseI2CCompareBytes,
  parseI2CInterface,
  parseI2CWriteBit,
  parseI2CWriteByte,
  parseI2CWriteBytes,
  parseIf,
  parseLogPhaseFault,
  parseNot,
  parseOr,
  parsePhaseFaultDetection,
  parsePMBusReadSensor,
  parsePMBusWriteVoutCommand,
  parsePresenceDetection,
  parseRail,
  parseRailArray,
  parseRoot,
  parseRule,
  parseRuleArray,
  parseRuleIdOrActionsProperty,
  parseRunRule,
  parseSensorMonitoring,
  parseSetDevice
} from "./config-file-parser.ts";
export type { ConfigFileContents } from "./config-file-parser.ts";
export { validateConfigDocument, validateConfigFile } from "./config-validator.ts";
export type { ConfigValidationIssue, ConfigValidationResult } from "./config-validator.ts";
export {
  getRequiredProperty,
  isJsonObject,
  parseBitPosition,
  parseBitValue,
  parseBoolean,
  parseDouble,
  parseHexByte,
  parseHexByteArray,
  parseInt8,
  parseString,
  parseUint8,
  parseUnsignedInteger,
  verifyIsArray,
  verifyIsObject,
  verifyPropertyCount
} from "./value-parsers.ts";
export type { JsonObject } from "./value-parsers.ts";

export const VOUT_MODE = 0x20;
export const VOUT_COMMAND = 0x21;

export const VOUT_DATA_FORMATS = ["linear", "vid", "direct", "ieee"] as const;
export type VoutDataFormat = (typeof VOUT_DATA_FORMATS)[number];

export const SENSOR_DATA_FORMATS = ["linear_11", "linear_16"] as const;
export type SensorDataFormat = (typeof SENSOR_DATA_FORMATS)[number];

export const SENSOR_TYPES = [
  "iout",
  "iout_peak",
  "iout_valley",
  "pout",
  "temperature",
  "temperature_peak",
  "vout",
  "vout_peak",
  "vout_valley"
] as const;
export type SensorType = (typeof SENSOR_TYPES)[number];

export interface VoutMode {
  format: VoutDataFormat;
  parameter: number;
}

function toSigned(value: number, bits: number): number {
  const signBit = 1 << (bits - 1);
  return value & signBit ? value - (1 << bits) : value;
}

// VOUT_MODE: bits 7:5 select the data format, bits 4:0 hold its parameter.
// For the linear format the parameter is a 5-bit two's complement exponent.
export function parseVoutMode(voutModeValue: number): VoutMode {
  const formatBits = (voutModeValue >> 5) & 0x07;
  const rawParameter = voutModeValue & 0x1f;
  const format = VOUT_DATA_FORMATS[formatBits];
  if (format === undefined) {
    throw new Error(`Invalid VOUT_MODE data format bits: ${formatBits}`);
  }

  return {
    format,
    parameter: format === "linear" ? toSigned(rawParameter, 5) : rawParameter
  };
}

export function convertToVoutLinear(volts: number, exponent: number): number {
  return Math.round(volts * 2 ** -exponent) & 0xffff;
}

export function convertFromVoutLinear(value: number, exponent: number): number {
  return value * 2 ** exponent;
}

// linear_11: bits 15:11 are a signed exponent, bits 10:0 a signed mantissa.
export function convertFromLinear(value: number): number {
  const exponent = toSigned((value >> 11) & 0x1f, 5);
  const mantissa = toSigned(value & 0x7ff, 11);
  return mantissa * 2 ** exponent;
}

export function isSensorType(value: string): value is SensorType {
  return (SENSOR_TYPES as ReadonlyArray<string>).includes(value);
}

export function isSensorDataFormat(value: string): value is SensorDataFormat {
  return (SENSOR_DATA_FORMATS as ReadonlyArray<string>).includes(value);
}

export function formatHexByte(value: number): string {
  return `0x${value.toString(16).toUpperCase().padStart(2, "0")}`;
}

export function formatHexWord(value: number): string {
  return `0x${value.toString(16).toUpperCase().padStart(4, "0")}`;
}

export function formatHexByteList(values: ReadonlyArray<number>): string {
  if (values.length === 0) {
    return "[ ]";
  }

  return `[ ${values.map((value) => formatHexByte(value)).join(", ")} ]`;
}

import { I2CError } from "./errors.ts";

export interface I2CTransport {
  read(bus: number, address: number, register: number, count: number): number[];
  write(bus: number, address: number, register: number, bytes: ReadonlyArray<number>): void;
}

type I2COperation = "byte" | "word" | "block data";

export class I2CInterface {
  readonly bus: number;
  readonly address: number;
  private transport: I2CTransport | null = null;

  constructor(bus: number, address: number) {
    this.bus = bus;
    this.address = address;
  }

  isOpen(): boolean {
    return this.transport !== null;
  }

  open(transport: I2CTransport): void {
    this.transport = transport;
  }

  close(): void {
    this.transport = null;
  }

  readByte(register: number): number {
    const [value] = this.read(register, 1, "byte");
    return value ?? 0;
  }

  // PMBus words are transferred low byte first.
  readWord(register: number): number {
    const [low, high] = this.read(register, 2, "word");
    return ((high ?? 0) << 8) | (low ?? 0);
  }

  readBytes(register: number, count: number): number[] {
    return this.read(register, count, "block data");
  }

  writeByte(register: number, value: number): void {
    this.write(register, [value & 0xff], "byte");
  }

  writeWord(register: number, value: number): void {
    this.write(register, [value & 0xff, (value >> 8) & 0xff], "word");
  }

  writeBytes(register: number, values: ReadonlyArray<number>): void {
    this.write(
      register,
      values.map((value) => value & 0xff),
      "block data"
    );
  }

  private requireTransport(operation: string): I2CTransport {
    if (this.transport === null) {
      throw new I2CError({
        message: `Failed to ${operation}: interface is not open`,
        bus: this.bus,
        address: this.address
      });
    }

    return this.transport;
  }

  private read(register: number, count: number, operation: I2COperation): number[] {
    const transport = this.requireTransport(`read ${operation}`);

    let bytes: number[];
    try {
      bytes = transport.read(this.bus, this.address, register, count);
    } catch (error) {
      throw new I2CError({
        message: `Failed to read ${operation}`,
        bus: this.bus,
        address: this.address,
        cause: error
      });
    }

    if (bytes.length !== count) {
      throw new I2CError({
        message: `Failed to read ${operation}: expected ${count} bytes, received ${bytes.length}`,
        bus: this.bus,
        address: this.address
      });
    }

    return bytes.map((value) => value & 0xff);
  }

  private write(register: number, bytes: number[], operation: I2COperation): void {
    const transport = this.requireTransport(`write ${operation}`);

    try {
      transport.write(this.bus, this.address, register, bytes);
    } catch (error) {
      throw new I2CError({
        message: `Failed to write ${operation}`,
        bus: this.bus,
        address: this.address,
        cause: error
      });
    }
  }
}

/**
 * EmulatedController.ts - In-memory SSD1306/SH1106 page-mode controller
 *
 * Implements DisplayTransport by interpreting the command stream into a
 * simulated display RAM. Every byte is logged, and either channel can be
 * made to fail.
 */

import type { DisplayTransport } from "./FlushEngine";

export type TransportEvent =
  | { kind: "command"; value: number }
  | { kind: "data"; page: number; column: number; bytes: Uint8Array };

// Commands followed by one parameter byte
const PARAMETER_COMMANDS = new Set([
  0x20, 0x81, 0x8d, 0xa8, 0xd3, 0xd5, 0xd9, 0xda, 0xdb,
]);

export interface EmulatedControllerOptions {
  /** Columns of display RAM (132 on SH1106) */
  ramWidth?: number;
  pages?: number;
  connected?: boolean;
}

export class EmulatedController implements DisplayTransport {
  readonly ramWidth: number;
  readonly pages: number;
  readonly ram: Uint8Array;
  readonly log: TransportEvent[] = [];

  connected: boolean;
  failCommands = false;
  failData = false;

  displayOn = false;
  page = 0;
  column = 0;
  private awaitingParameter = false;

  constructor(options: EmulatedControllerOptions = {}) {
    this.ramWidth = options.ramWidth ?? 128;
    this.pages = options.pages ?? 8;
    this.connected = options.connected ?? true;
    this.ram = new Uint8Array(this.ramWidth * this.pages);
  }

  probe(): boolean {
    return this.connected;
  }

  sendCommand(command: number): boolean {
    if (!this.connected || this.failCommands) return false;
    this.log.push({ kind: "command", value: command });

    if (this.awaitingParameter) {
      this.awaitingParameter = false;
      return true;
    }
    if (PARAMETER_COMMANDS.has(command)) {
      this.awaitingParameter = true;
    } else if (command === 0xae || command === 0xaf) {
      this.displayOn = command === 0xaf;
    } else if (command >= 0xb0 && command <= 0xbf) {
      // Pages past this.pages are selectable but sendData ignores them
      this.page = command & 0x0f;
    } else if (command <= 0x0f) {
      this.column = (this.column & 0xf0) | command;
    } else if (command <= 0x1f) {
      this.column = (this.column & 0x0f) | ((command & 0x0f) << 4);
    }
    return true;
  }

  sendData(data: Uint8Array): boolean {
    if (!this.connected || this.failData) return false;
    this.log.push({
      kind: "data",
      page: this.page,
      column: this.column,
      bytes: data.slice(),
    });

    if (this.page < this.pages) {
      const base = this.page * this.ramWidth;
      for (const byte of data) {
        if (this.column >= this.ramWidth) break;
        this.ram[base + this.column] = byte;
        this.column++;
      }
    }
    return true;
  }

  commands(): number[] {
    const values: number[] = [];
    for (const event of this.log) {
      if (event.kind === "command") values.push(event.value);
    }
    return values;
  }

  dataWrites(): Extract<TransportEvent, { kind: "data" }>[] {
    return this.log.filter(
      (event): event is Extract<TransportEvent, { kind: "data" }> =>
        event.kind === "data",
    );
  }

  clearLog(): void {
    this.log.length = 0;
  }

  /**
   * The visible window of RAM in page format, `width` columns from `offset`
   */
  visibleBuffer(width: number, offset = 0): Uint8Array {
    const out = new Uint8Array(width * this.pages);
    for (let page = 0; page < this.pages; page++) {
      for (let x = 0; x < width; x++) {
        const column = offset + x;
        if (column < this.ramWidth) {
          out[page * width + x] = this.ram[page * this.ramWidth + column];
        }
      }
    }
    return out;
  }
}

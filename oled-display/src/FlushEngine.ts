/**
 * FlushEngine.ts - Send only the pages that changed since the last refresh
 */

import type { PageBuffer } from "./PageBuffer";

/**
 * Byte-level link to the controller. Calls are synchronous and report
 * success; a failed call must leave nothing half-applied on our side.
 */
export interface DisplayTransport {
  sendCommand(command: number): boolean;
  sendData(data: Uint8Array): boolean;
  /** Optional presence check, used once during init */
  probe?(): boolean;
}

export interface PageAddressing {
  /** OR-ed with the page index to select a page (0xB0 on SSD1306) */
  pageSelectBase: number;
  /** Sent after the page select to return to the first column */
  columnResetCommands: readonly number[];
}

export function dirtyPages(canvas: PageBuffer): boolean[] {
  const dirty: boolean[] = [];
  for (let page = 0; page < canvas.pages; page++) {
    dirty.push(canvas.isPageDirty(page));
  }
  return dirty;
}

/**
 * Address one page and write its bytes. Every step is attempted even
 * after a failure.
 */
function writePage(
  canvas: PageBuffer,
  page: number,
  transport: DisplayTransport,
  addressing: PageAddressing,
): boolean {
  let success = transport.sendCommand((addressing.pageSelectBase | page) & 0xff);
  for (const command of addressing.columnResetCommands) {
    success = transport.sendCommand(command) && success;
  }
  return transport.sendData(canvas.page(page)) && success;
}

/**
 * Push dirty pages to the device. The shadow copy only advances when
 * every write succeeded, so failed pages are retried by the next refresh.
 */
export function refresh(
  canvas: PageBuffer,
  transport: DisplayTransport,
  addressing: PageAddressing,
): boolean {
  const dirty = dirtyPages(canvas);
  if (!dirty.includes(true)) return true;

  let success = true;
  for (let page = 0; page < canvas.pages; page++) {
    if (!dirty[page]) continue;
    success = writePage(canvas, page, transport, addressing) && success;
  }

  if (success) canvas.commit();
  return success;
}

/**
 * Blank the working buffer and the device, skipping the diff
 */
export function clearAndSync(
  canvas: PageBuffer,
  transport: DisplayTransport,
  addressing: PageAddressing,
): boolean {
  canvas.clear();

  let success = true;
  for (let page = 0; page < canvas.pages; page++) {
    success = writePage(canvas, page, transport, addressing) && success;
  }

  if (success) canvas.resetShadow();
  return success;
}

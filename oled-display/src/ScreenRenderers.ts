/**
 * ScreenRenderers.ts - Boot and machine status screens
 */

import type { OLEDDisplay } from "./OLEDDisplay";
import type { XbmImage } from "./OLEDImages";
import { WHITE } from "./PageBuffer";
import { TEXT_ALIGN_LEFT, TEXT_ALIGN_RIGHT } from "./TextLayout";

const MM_DECIMALS = 3;
const INCH_DECIMALS = 4;
const MM_PER_INCH = 25.4;

// Row layout for a 64 pixel tall panel with the 8 pixel font
const POSITION_TOP = 16;
const POSITION_ROW_HEIGHT = 12;
const POSITION_ROWS = 3;
const FOOTER_OFFSET = 12;
const PROGRESS_TOP = 9;
const PROGRESS_HEIGHT = 6;

export interface AxisReading {
  name: string;
  /** Machine position in millimetres */
  position: number;
}

export interface MachineStatus {
  state: string;
  ip?: string;
  axes: AxisReading[];
  /** Triggered flag per axis, in axis order */
  endstops: boolean[];
  reportInches?: boolean;
  /** Job progress in percent; drawn under the address when set */
  progress?: number;
}

/**
 * Draw a border around the panel with the logo centered inside
 */
export function drawBootScreen(display: OLEDDisplay, logo: XbmImage): void {
  const width = display.getWidth();
  const height = display.getHeight();

  display.setColor(WHITE);
  display.drawRect(0, 0, width, height);
  display.drawXbm(
    Math.trunc((width - logo.width) / 2),
    Math.trunc((height - logo.height) / 2),
    logo.width,
    logo.height,
    logo.bits,
  );
}

export function formatAxisPosition(mm: number, inches = false): string {
  return inches
    ? (mm / MM_PER_INCH).toFixed(INCH_DECIMALS)
    : mm.toFixed(MM_DECIMALS);
}

/**
 * Draw the machine status screen: state, address, progress, positions
 * and endstops.
 * Axes beyond the first three go in a second column.
 */
export function drawStatusScreen(
  display: OLEDDisplay,
  status: MachineStatus,
): void {
  const screenW = display.getWidth();
  const halfW = Math.floor(screenW / 2);

  display.setColor(WHITE);
  display.setTextAlignment(TEXT_ALIGN_LEFT);

  display.setFont("big");
  display.drawString(0, 0, status.state);

  display.setFont("small");
  if (status.ip) {
    display.setTextAlignment(TEXT_ALIGN_RIGHT);
    display.drawString(screenW, 0, status.ip);
    display.setTextAlignment(TEXT_ALIGN_LEFT);
  }

  if (status.progress !== undefined) {
    display.drawProgressBar(
      halfW,
      PROGRESS_TOP,
      screenW - halfW,
      PROGRESS_HEIGHT,
      status.progress,
    );
  }

  status.axes.forEach((axis, index) => {
    const column = Math.floor(index / POSITION_ROWS);
    const row = index % POSITION_ROWS;
    display.drawString(
      column * halfW,
      POSITION_TOP + row * POSITION_ROW_HEIGHT,
      `${axis.name}:${formatAxisPosition(axis.position, status.reportInches)}`,
    );
  });

  const endstops = status.axes
    .map((axis, index) => `${axis.name}:${status.endstops[index] ? 1 : 0}`)
    .join(" ");
  if (endstops) {
    display.drawString(0, display.getHeight() - FOOTER_OFFSET, endstops);
  }
}

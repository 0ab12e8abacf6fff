/**
 * OLEDImages.ts - Boot logo
 *
 * Format: XBM style (LSB first, horizontal scanning)
 */

import logo from "./assets/logo.json";

export interface XbmImage {
  width: number;
  height: number;
  bits: readonly number[];
}

export const BOOT_LOGO: XbmImage = logo;

/**
 * DisplayConfig.ts - Validated, immutable controller configuration
 */

import { z } from "zod";
import { PAGE_HEIGHT } from "./PageBuffer";

const byte = z.number().int().min(0).max(0xff);

export const DisplayConfigSchema = z
  .object({
    width: z.number().int().min(1).max(256),
    height: z.number().int().min(1).max(256),
    pageSelectBase: byte.default(0xb0),
    columnResetCommands: z.array(byte).default([0x00, 0x10]),
    initSequence: z.array(byte).default([]),
    charSpacing: z.number().int().min(0).max(8).default(1),
  })
  .superRefine((config, ctx) => {
    // Every page needs its own select command
    const pages = Math.ceil(config.height / PAGE_HEIGHT);
    const selects = new Set<number>();
    for (let page = 0; page < pages; page++) {
      selects.add((config.pageSelectBase | page) & 0xff);
    }
    if (selects.size < pages) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["height"],
        message: `needs ${pages} pages, more than page-select base 0x${config.pageSelectBase.toString(16)} can address`,
      });
    }
  });

export type DisplayConfigInput = z.input<typeof DisplayConfigSchema>;

export type DisplayConfig = Readonly<
  Omit<z.output<typeof DisplayConfigSchema>, "columnResetCommands" | "initSequence">
> & {
  readonly columnResetCommands: readonly number[];
  readonly initSequence: readonly number[];
};

export class DisplayConfigError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(issues: z.ZodIssue[]) {
    super(
      `Invalid display config: ${issues
        .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
        .join("; ")}`,
    );
    this.name = "DisplayConfigError";
    this.issues = issues;
  }
}

export function parseDisplayConfig(input: unknown): DisplayConfig {
  const result = DisplayConfigSchema.safeParse(input);
  if (!result.success) {
    throw new DisplayConfigError(result.error.issues);
  }
  const config = result.data;
  return Object.freeze({
    ...config,
    columnResetCommands: Object.freeze([...config.columnResetCommands]),
    initSequence: Object.freeze([...config.initSequence]),
  });
}

import { z } from "zod";
import { presenterNameSchema } from "../config/schema.js";
import type { PresenterName } from "../config/types.js";

const presenterListSchema = z.array(presenterNameSchema).min(1);

export function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/** Parse a comma separated `--present` value; throws on unknown names. */
export function parsePresenterList(value: string): PresenterName[] {
  const result = presenterListSchema.safeParse(splitList(value));
  if (!result.success) {
    throw new Error(
      `Unknown presenter in "${value}" (expected a comma separated list of ${presenterNameSchema.options.join(", ")})`,
    );
  }
  return result.data;
}

import type { PresenterName } from "../config/types.js";
import type { UsageSummary } from "../summary/types.js";

/** Renders a finished summary somewhere. Must not modify it. */
export interface Presenter {
  readonly name: PresenterName;
  render(summary: UsageSummary): Promise<void>;
}

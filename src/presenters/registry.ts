import type { Writable } from "node:stream";
import type { PresenterName } from "../config/types.js";
import { ConsolePresenter } from "./console.js";
import { HtmlPresenter } from "./html.js";
import { TerminalPresenter } from "./terminal.js";
import type { Presenter } from "./types.js";

export const DEFAULT_HTML_PATH = "wrapped.html";

export class PresenterRegistry {
  private readonly presenters = new Map<PresenterName, Presenter>();

  register(presenter: Presenter): void {
    if (this.presenters.has(presenter.name)) {
      throw new Error(`Presenter already registered: ${presenter.name}`);
    }
    this.presenters.set(presenter.name, presenter);
  }

  get(name: PresenterName): Presenter | undefined {
    return this.presenters.get(name);
  }

  has(name: PresenterName): boolean {
    return this.presenters.has(name);
  }

  list(): Presenter[] {
    return [...this.presenters.values()];
  }
}

export interface PresenterDeps {
  readonly stdout: Writable;
  readonly htmlPath?: string;
}

export function createPresenter(name: PresenterName, deps: PresenterDeps): Presenter {
  switch (name) {
    case "console":
      return new ConsolePresenter(deps.stdout);
    case "terminal":
      return new TerminalPresenter(deps.stdout);
    case "html":
      return new HtmlPresenter(deps.htmlPath ?? DEFAULT_HTML_PATH);
  }
}

/** One presenter per distinct name, in the order first listed. */
export function createRegistry(names: readonly PresenterName[], deps: PresenterDeps): PresenterRegistry {
  const registry = new PresenterRegistry();
  for (const name of names) {
    if (!registry.has(name)) registry.register(createPresenter(name, deps));
  }
  return registry;
}

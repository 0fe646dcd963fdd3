import type { Writable } from "node:stream";

const BANNER = `
  ╦ ╦┬─┐┌─┐┌─┐┌─┐┌─┐┌┬┐
  ║║║├┬┘├─┤├─┘├─┘├┤  ││
  ╚╩╝┴└─┴ ┴┴  ┴  └─┘─┴┘
`;

const TAGLINES = [
  "A year of tokens, one page.",
  "Every request, counted.",
  "Your usage, in review.",
  "Cache hits and late nights.",
];

export function printBanner(out: Writable, version: string): void {
  const tagline = TAGLINES[Math.floor(Math.random() * TAGLINES.length)];
  out.write(`${BANNER}\n  v${version} — ${tagline}\n\n`);
}

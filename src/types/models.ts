import type { PageStructureError } from "../core/errors";

export type ModeName = "whats-new" | "latest-versions" | "download" | "pep";

export const MODE_NAMES: readonly ModeName[] = ["whats-new", "latest-versions", "download", "pep"];

export function isModeName(value: string): value is ModeName {
  return MODE_NAMES.some((mode) => mode === value);
}

export type OutputMode = "pretty" | "file" | "none";

export type Cell = string | number;

export type Row = readonly Cell[];

export type Located<T> = { ok: true; value: T } | { ok: false; error: PageStructureError };

export type ModeResult =
  | { status: "ok"; rows: Row[] }
  | { status: "saved"; path: string }
  | { status: "skipped"; reason: string }
  | { status: "fatal"; error: PageStructureError };

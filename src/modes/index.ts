import { ModeName } from "../types";
import { download } from "./download";
import { latestVersions } from "./latestVersions";
import { pep } from "./pep";
import { ModeHandler } from "./types";
import { whatsNew } from "./whatsNew";

export const MODE_HANDLERS: Readonly<Record<ModeName, ModeHandler>> = {
  "whats-new": whatsNew,
  "latest-versions": latestVersions,
  download,
  pep,
};

export * from "./types";

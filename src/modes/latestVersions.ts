import { PageStructureError } from "../core/errors";
import { decodeText, getResponse } from "../core/session";
import { findAllTags, findTag, parseHtml } from "../crawl";
import { ModeResult, Row } from "../types";
import { fatal, ModeDependencies, skipped } from "./types";

export const LATEST_VERSIONS_HEADER: Row = ["Link to documentation", "Version", "Status"];

const ALL_VERSIONS_MARKER = "All versions";
const VERSION_PATTERN = /Python (?<version>\d\.\d+) \((?<status>.*)\)/;

export interface VersionLabel {
  version: string;
  status: string;
}

export function parseVersionLabel(text: string): VersionLabel {
  const groups = VERSION_PATTERN.exec(text)?.groups;
  if (!groups) {
    return { version: text, status: "" };
  }
  return { version: groups.version, status: groups.status };
}

export async function latestVersions(deps: ModeDependencies): Promise<ModeResult> {
  const { config, logger, session } = deps;
  const response = await getResponse(session, config.mainDocUrl, logger);
  if (!response) {
    return skipped(config.mainDocUrl);
  }

  const $ = parseHtml(decodeText(response));
  const sidebar = findTag($.root(), "div", { class: "sphinxsidebarwrapper" });
  if (!sidebar.ok) {
    return fatal(sidebar.error);
  }

  const versionList = findAllTags(sidebar.value, "ul")
    .toArray()
    .map((list) => $(list))
    .find((list) => list.text().includes(ALL_VERSIONS_MARKER));
  if (!versionList) {
    return fatal(new PageStructureError("ul", {}, `No sidebar list mentions "${ALL_VERSIONS_MARKER}"`));
  }

  const rows: Row[] = [LATEST_VERSIONS_HEADER];
  for (const anchor of findAllTags(versionList, "a").toArray()) {
    const link = $(anchor);
    const { version, status } = parseVersionLabel(link.text());
    rows.push([link.attr("href") ?? "", version, status]);
  }

  logger.debug("latest_versions_parsed", { total: rows.length - 1 });
  return { status: "ok", rows };
}

import fs from "node:fs";
import path from "node:path";
import { decodeText, getResponse } from "../core/session";
import { findTag, parseHtml, resolveUrl } from "../crawl";
import { ModeResult } from "../types";
import { fatal, ModeDependencies, skipped } from "./types";

const ARCHIVE_LINK_PATTERN = /.+pdf-a4\.zip$/;

export function archiveFileName(archiveUrl: string): string {
  return path.posix.basename(new URL(archiveUrl).pathname);
}

async function writeAtomically(filePath: string, content: Buffer): Promise<void> {
  const tempPath = `${filePath}.part`;
  try {
    await fs.promises.writeFile(tempPath, content);
    await fs.promises.rename(tempPath, filePath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }
}

export async function download(deps: ModeDependencies): Promise<ModeResult> {
  const { config, logger, metrics, session } = deps;
  const downloadsUrl = resolveUrl(config.mainDocUrl, "download.html");
  const response = await getResponse(session, downloadsUrl, logger);
  if (!response) {
    return skipped(downloadsUrl);
  }

  const $ = parseHtml(decodeText(response));
  const table = findTag($.root(), "table", { class: "docutils" });
  if (!table.ok) {
    return fatal(table.error);
  }
  const archiveLink = findTag(table.value, "a", { href: ARCHIVE_LINK_PATTERN });
  if (!archiveLink.ok) {
    return fatal(archiveLink.error);
  }

  const archiveUrl = resolveUrl(downloadsUrl, archiveLink.value.attr("href") ?? "");
  const archive = await getResponse(session, archiveUrl, logger);
  if (!archive) {
    return skipped(archiveUrl);
  }

  const downloadsDir = path.resolve(config.outputDirs.downloads);
  await fs.promises.mkdir(downloadsDir, { recursive: true });
  const archivePath = path.join(downloadsDir, archiveFileName(archiveUrl));
  await writeAtomically(archivePath, archive.body);

  metrics.incrementCounter("files_saved", 1);
  logger.info("download_saved", { url: archiveUrl, path: archivePath, bytes: archive.body.length });
  return { status: "saved", path: archivePath };
}

export const MAIN_DOC_URL = "https://docs.python.org/3/";
export const PEP_URL = "https://peps.python.org/";

export function whatsNewIndexPage(articles: string[]): string {
  const items = articles
    .map((href) => `<li class="toctree-l1"><a class="reference internal" href="${href}">What's New in ${href}</a></li>`)
    .join("\n");
  return `<html><body>
<section id="what-s-new-in-python">
  <h1>What's New in Python</h1>
  <div class="toctree-wrapper compound">
    <ul>
${items}
    </ul>
  </div>
</section>
</body></html>`;
}

export function whatsNewArticlePage(title: string, editorLines: string[]): string {
  return `<html><body>
<section>
  <h1>${title}</h1>
  <dl class="field-list simple">
<dt>Editor</dt>
<dd>${editorLines.join("\n")}</dd>
</dl>
</section>
</body></html>`;
}

export function mainPage(versionLinks: Array<{ href: string; text: string }>): string {
  const links = versionLinks.map((link) => `<li><a href="${link.href}">${link.text}</a></li>`).join("\n");
  return `<html><body>
<div class="sphinxsidebar">
  <div class="sphinxsidebarwrapper">
    <h3>Docs by version</h3>
    <ul>
      <li><a href="https://docs.python.org/3/">Stable</a></li>
    </ul>
    <ul>
${links}
      <li><a href="https://www.python.org/doc/versions/">All versions</a></li>
    </ul>
  </div>
</div>
</body></html>`;
}

export function downloadsPage(archiveHrefs: string[]): string {
  const cells = archiveHrefs.map((href) => `<td><a class="reference external" href="${href}">Download</a></td>`).join("");
  return `<html><body>
<table class="docutils align-default">
  <thead><tr><th>Format</th><th>Packed as .zip</th></tr></thead>
  <tbody>
    <tr><td>PDF (US-Letter paper size)</td><td><a href="archives/archive-3.12.pdf-letter.zip">Download</a></td></tr>
    <tr><td>PDF (A4 paper size)</td>${cells}</tr>
  </tbody>
</table>
</body></html>`;
}

export interface PepIndexEntry {
  number: number;
  abbreviation: string;
}

export function pepIndexPage(entries: PepIndexEntry[]): string {
  const rows = entries
    .map(
      (entry) =>
        `<tr><td><abbr>${entry.abbreviation}</abbr></td><td><a href="pep-${String(entry.number).padStart(4, "0")}/">${entry.number}</a></td><td>Title of PEP ${entry.number}</td></tr>`,
    )
    .join("\n");
  return `<html><body>
<section id="index-by-category">
  <table><tbody><tr><td>SF</td><td><a href="pep-9999/">9999</a></td></tr></tbody></table>
</section>
<section id="numerical-index">
  <h2>Numerical Index</h2>
  <table class="pep-zero-table">
    <thead><tr><th>Type</th><th>PEP</th><th>Title</th></tr></thead>
    <tbody>
${rows}
    </tbody>
  </table>
</section>
</body></html>`;
}

export function pepCardPage(status: string): string {
  return `<html><body>
<section id="pep-content">
  <h1>PEP card</h1>
  <dl class="rfc2822 field-list simple">
    <dt class="field-odd">Author<span class="colon">:</span></dt>
    <dd class="field-odd">Someone</dd>
    <dt class="field-even">Status<span class="colon">:</span></dt>
    <dd class="field-even"><abbr title="Accepted and implementation complete">${status}</abbr></dd>
    <dt class="field-odd">Type<span class="colon">:</span></dt>
    <dd class="field-odd">Process</dd>
  </dl>
</section>
</body></html>`;
}

export function pepCardUrl(pepNumber: number): string {
  return `${PEP_URL}pep-${String(pepNumber).padStart(4, "0")}/`;
}

// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { BatchSummary, GenerationResult, QrEntry } from "../page/types.js";

export function esc(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

const STYLE = `
body { font-family: system-ui, sans-serif; max-width: 44rem; margin: 2rem auto; padding: 0 1rem; }
fieldset { margin-bottom: 1.25rem; }
label { display: block; margin: 0.4rem 0 0.15rem; }
input[type=text] { width: 100%; box-sizing: border-box; }
.ok { color: #1a7f37; }
.err { color: #cf222e; }
.warn { color: #9a6700; }
`;

function layout(title: string, body: string): string {
  return `<!doctype html>
<html lang="en">
<head><meta charset="utf-8"><title>${esc(title)}</title><style>${STYLE}</style></head>
<body>
<h1>${esc(title)}</h1>
${body}
</body>
</html>
`;
}

function field(name: string, label: string, value = ""): string {
  return `<label for="${name}">${esc(label)}</label><input type="text" id="${name}" name="${name}" value="${esc(value)}">`;
}

/**
 * The main form: shared output/font settings, then one form per mode.
 * Both forms carry the shared fields so each submits a complete request.
 */
export function renderForm(defaults: { outputDirectory: string; fontPath?: string }): string {
  const shared =
    field("outputDirectory", "Save directory", defaults.outputDirectory) +
    field("fontPath", "Font file (optional)", defaults.fontPath ?? "");

  return layout(
    "QR Page Maker",
    `<form method="post" action="/single">
<fieldset><legend>Single QR code</legend>
${shared}
${field("title", "Title")}
${field("url", "URL")}
<p><button type="submit">Generate single QR code</button></p>
</fieldset>
</form>
<form method="post" action="/batch">
<fieldset><legend>Batch processing (CSV)</legend>
${shared}
${field("csvPath", "CSV file (Title,URL columns)")}
<p><button type="submit">Generate QR codes from CSV</button></p>
</fieldset>
</form>`,
  );
}

function describeEntry(entry: QrEntry): string {
  const where = entry.row !== undefined ? `Row ${entry.row}: ` : "";
  return `${where}${entry.title || "(no title)"} - ${entry.url || "(no URL)"}`;
}

function warningList(warnings: string[]): string {
  if (warnings.length === 0) return "";
  return `<ul>${warnings.map((w) => `<li class="warn">${esc(w)}</li>`).join("")}</ul>`;
}

const BACK = `<p><a href="/">Back</a></p>`;

export function renderResult(result: GenerationResult): string {
  const body =
    result.status === "success"
      ? `<p class="ok">Single QR code generated successfully: ${esc(result.outputPath)}</p>`
      : `<p class="err">${esc(result.reason.kind)}: ${esc(result.reason.message)}</p>
<p>${esc(describeEntry(result.entry))}</p>`;
  return layout("QR Page Maker", body + warningList(result.warnings) + BACK);
}

export function renderSummary(summary: BatchSummary): string {
  const line = `${summary.total} total, ${summary.succeeded} succeeded, ${summary.failed} failed`;
  const failures =
    summary.failures.length === 0
      ? ""
      : `<ul>${summary.failures
          .map(
            (f) =>
              `<li class="err">${esc(describeEntry(f.entry))}: ${esc(f.reason.kind)} (${esc(f.reason.message)})</li>`,
          )
          .join("")}</ul>`;
  return layout(
    "QR Page Maker",
    `<p class="${summary.failed === 0 ? "ok" : "err"}">${esc(line)}</p>` +
      failures +
      warningList(summary.warnings) +
      BACK,
  );
}

export function renderError(message: string): string {
  return layout("QR Page Maker", `<p class="err">Error: ${esc(message)}</p>${BACK}`);
}

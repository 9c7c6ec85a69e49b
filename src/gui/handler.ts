// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { FatalInputError, ValidationError } from "../errors.js";
import { runBatchFromCsv } from "../page/batch.js";
import { resolveConfig } from "../page/config.js";
import { runSingle } from "../page/generate.js";
import type { GenerationConfig } from "../page/types.js";
import { renderError, renderForm, renderResult, renderSummary } from "./html.js";
import type { GuiHandlerConfig, GuiRequest, GuiResponse } from "./types.js";

/**
 * Create the request handler behind the local GUI.
 *
 * Routes:
 *
 * - `GET /` — the form (save directory, font, single title/URL, CSV path)
 * - `POST /single` — generate one page from `title` and `url`
 * - `POST /batch` — generate a page per row of the CSV at `csvPath`
 *
 * Responses are HTML unless the request accepts `application/json`.
 * A run where every entry succeeds answers 200; one with failed entries
 * answers 422; bad input (missing fields, invalid settings, a CSV without
 * the required headers) answers 400.
 *
 * @example
 * ```ts
 * const handle = createGuiHandler({ defaults: { outputDirectory: "./output" } });
 * const response = await handle({
 *   method: "POST",
 *   path: "/single",
 *   body: { title: "Spring Fair", url: "https://example.com/fair" },
 *   headers: { accept: "application/json" },
 * });
 * ```
 */
export function createGuiHandler(
  config: GuiHandlerConfig,
): (req: GuiRequest) => Promise<GuiResponse> {
  const { defaults, onRun } = config;

  return async (req: GuiRequest): Promise<GuiResponse> => {
    const path = "/" + req.path.replace(/^\/+|\/+$/g, "");
    const json = (req.headers["accept"] ?? "").includes("application/json");

    if (path === "/") {
      if (req.method !== "GET") return errorResponse(405, "Method not allowed. Use GET for the form.", json);
      return { status: 200, headers: htmlHeaders(), body: renderForm(defaults) };
    }
    if (path !== "/single" && path !== "/batch") {
      return errorResponse(404, "Not found", json);
    }
    if (req.method !== "POST") {
      return errorResponse(405, `Method not allowed. Use POST for ${path}.`, json);
    }

    const fields = formFields(req.body);
    let generation: GenerationConfig;
    try {
      generation = resolveConfig({
        ...config.generation,
        outputDirectory: fields["outputDirectory"] || defaults.outputDirectory,
        fontPath: fields["fontPath"] || defaults.fontPath,
      });
    } catch (err) {
      if (err instanceof ValidationError) return errorResponse(400, err.message, json);
      throw err;
    }

    if (path === "/single") {
      const title = fields["title"] ?? "";
      const url = fields["url"] ?? "";
      if (title.trim() === "" || url.trim() === "") {
        return errorResponse(400, "Please enter a title and a URL", json);
      }
      const result = await runSingle({ title, url }, generation);
      onRun?.({ mode: "single", result });
      const status = result.status === "success" ? 200 : 422;
      return json
        ? jsonResponse(status, result)
        : { status, headers: htmlHeaders(), body: renderResult(result) };
    }

    const csvPath = (fields["csvPath"] ?? "").trim();
    if (csvPath === "") {
      return errorResponse(400, "Please select a CSV file", json);
    }
    try {
      const summary = await runBatchFromCsv(csvPath, generation);
      onRun?.({ mode: "batch", csvPath, summary });
      const status = summary.failed === 0 ? 200 : 422;
      return json
        ? jsonResponse(status, summary)
        : { status, headers: htmlHeaders(), body: renderSummary(summary) };
    } catch (err) {
      if (err instanceof FatalInputError) return errorResponse(400, err.message, json);
      throw err;
    }
  };
}

/** Read string fields from a parsed form or JSON body; anything else is ignored. */
function formFields(body: unknown): Record<string, string> {
  const fields: Record<string, string> = {};
  if (body && typeof body === "object") {
    for (const [key, value] of Object.entries(body)) {
      if (typeof value === "string") fields[key] = value;
    }
  }
  return fields;
}

function htmlHeaders(): Record<string, string> {
  return { "content-type": "text/html; charset=utf-8", "cache-control": "no-store" };
}

function jsonResponse(status: number, body: unknown): GuiResponse {
  return {
    status,
    headers: {
      "content-type": "application/json",
      "cache-control": "no-store",
    },
    body: JSON.stringify(body),
  };
}

function errorResponse(status: number, message: string, json: boolean): GuiResponse {
  return json
    ? jsonResponse(status, { error: message })
    : { status, headers: htmlHeaders(), body: renderError(message) };
}

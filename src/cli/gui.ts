// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { Command } from "commander";
import { createServer } from "node:http";
import type { IncomingMessage } from "node:http";
import { resolve } from "node:path";
import { createGuiHandler } from "../gui/handler.js";
import {
  DEFAULT_OUTPUT_DIR,
  parseLevel,
  parsePageSize,
  parsePositiveInt,
  pageSettings,
} from "./options.js";
import type { PageOptions } from "./options.js";

interface GuiOptions extends PageOptions {
  port: number;
  host: string;
  output: string;
}

export function registerGuiCommand(program: Command): void {
  program
    .command("gui")
    .description("Start the graphical front-end as a local web page")
    .option("--port <port>", "Port to listen on", parsePositiveInt, 3457)
    .option("--host <host>", "Interface to bind", "127.0.0.1")
    .option("-o, --output <dir>", "Default save directory", DEFAULT_OUTPUT_DIR)
    .option("--font <path>", "Default font file")
    .option("--ec <level>", "QR error correction level: L, M, Q or H", parseLevel, "M")
    .option("--box-size <n>", "Pixels per QR module before scaling", parsePositiveInt, 10)
    .option("--page <size>", "Page size: letter or a4", parsePageSize, "letter")
    .option("--dpi <n>", "Page resolution", parsePositiveInt, 300)
    .action((opts: GuiOptions) => {
      const outputDirectory = resolve(opts.output);
      const handler = createGuiHandler({
        defaults: { outputDirectory, fontPath: opts.font },
        generation: pageSettings(opts),
        onRun: (event) => {
          const stamp = new Date().toISOString();
          if (event.mode === "single") {
            const outcome = event.result.status === "success"
              ? event.result.outputPath
              : `${event.result.reason.kind}: ${event.result.reason.message}`;
            console.log(`[${stamp}] Single: ${outcome}`);
          } else {
            const s = event.summary;
            console.log(`[${stamp}] Batch ${event.csvPath}: ${s.succeeded}/${s.total} succeeded, ${s.failed} failed`);
          }
        },
      });

      const server = createServer(async (req, res) => {
        const url = new URL(req.url ?? "/", `http://${opts.host}:${opts.port}`);
        const headers: Record<string, string | undefined> = {};
        for (const [key, value] of Object.entries(req.headers)) {
          headers[key.toLowerCase()] = Array.isArray(value) ? value[0] : value;
        }

        try {
          const body = req.method === "POST" ? await readBody(req, headers["content-type"]) : undefined;
          const response = await handler({
            method: req.method ?? "GET",
            path: url.pathname,
            body,
            headers,
          });
          res.writeHead(response.status, response.headers);
          res.end(response.body);
        } catch (err) {
          res.writeHead(500, { "Content-Type": "application/json" });
          res.end(JSON.stringify({ error: "Internal server error" }));
          console.error("Handler error:", err);
        }
      });

      server.listen(opts.port, opts.host, () => {
        console.log(`\x1b[32m✓ QR Page Maker GUI running\x1b[0m`);
        console.log(`  Open:   http://${opts.host}:${opts.port}/`);
        console.log(`  Output: ${outputDirectory}`);
        console.log(`\nPress Ctrl+C to stop`);
      });
    });
}

/** Parse a form-encoded or JSON request body into a plain object. */
async function readBody(req: IncomingMessage, contentType: string | undefined): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  const text = Buffer.concat(chunks).toString("utf8");

  if (contentType?.includes("application/json")) {
    try {
      return JSON.parse(text) as unknown;
    } catch {
      return undefined;
    }
  }
  return Object.fromEntries(new URLSearchParams(text));
}

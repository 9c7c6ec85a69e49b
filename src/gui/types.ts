// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { BatchSummary, GenerationOptions, GenerationResult } from "../page/types.js";

/**
 * Framework-agnostic incoming request.
 */
export interface GuiRequest {
  /** HTTP method (uppercase) */
  method: string;
  /** Request path, e.g. "/" or "/batch" */
  path: string;
  /** Parsed form or JSON body (for POST requests) */
  body?: unknown;
  /** Request headers (lowercase keys) */
  headers: Record<string, string | undefined>;
}

/**
 * Framework-agnostic outgoing response.
 */
export interface GuiResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

/**
 * Emitted after every generation request the GUI runs.
 */
export type GuiRunEvent =
  | { mode: "single"; result: GenerationResult }
  | { mode: "batch"; csvPath: string; summary: BatchSummary };

/**
 * Configuration for the GUI request handler.
 */
export interface GuiHandlerConfig {
  /** Values the form starts with; also used when a field is submitted blank */
  defaults: {
    outputDirectory: string;
    fontPath?: string;
  };
  /** Page, QR and layout settings applied to every run */
  generation?: Omit<GenerationOptions, "outputDirectory" | "fontPath">;
  /** Called after each single or batch run completes */
  onRun?: (event: GuiRunEvent) => void;
}

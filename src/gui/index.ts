// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
export { createGuiHandler } from "./handler.js";
export type { GuiRequest, GuiResponse, GuiHandlerConfig, GuiRunEvent } from "./types.js";

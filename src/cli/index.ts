#!/usr/bin/env node
/**
 * logtemplate CLI entry point
 *
 * Commands:
 * - render   - Render a template with positional values
 * - inspect  - Show the positional form and names of a template
 * - values   - List placeholder names paired with values
 */

import { Command } from "commander";

import { VERSION } from "../version.js";

import { registerInspectCommand } from "./commands/inspect.js";
import { registerRenderCommand } from "./commands/render.js";
import { registerValuesCommand } from "./commands/values.js";

const program = new Command();

program
  .name("logtemplate")
  .description("Parse, render and extract named message templates for structured logging")
  .version(VERSION);

registerRenderCommand(program);
registerInspectCommand(program);
registerValuesCommand(program);

program.parse();

#!/usr/bin/env node
import { Command } from "commander";
import { initCommand } from "./commands/init.js";
import { previewCommand } from "./commands/preview.js";
import { renderCommand } from "./commands/render.js";
import { validateCommand } from "./commands/validate.js";

const program = new Command();

program
  .name("pixelstage")
  .description("Rasterize 2D shape scenes into RGBA framebuffers")
  .version("0.1.0");

program
  .command("render <scene>")
  .description("Render one frame of a YAML/JSON scene to a PAM image")
  .option("-o, --output <file>", "Output file path (default: <scene>.pam)")
  .option("--frame <id>", "Frame ID to render (default: first frame)")
  .action(renderCommand);

program
  .command("preview <scene>")
  .description("Print an ASCII preview of a scene frame")
  .option("--frame <id>", "Frame ID to preview (default: first frame)")
  .option("--all", "Preview every frame in order")
  .action(previewCommand);

program
  .command("validate <scene>")
  .description("Report shapes that will be skipped or drawn oddly")
  .option("--frame <id>", "Frame ID to validate (default: first frame)")
  .action(validateCommand);

program
  .command("init")
  .description("Print a template scene file")
  .option("-t, --template <name>", "Template name (shapes, smoke)", "shapes")
  .action(initCommand);

program.parse();

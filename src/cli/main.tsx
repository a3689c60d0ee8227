/**
 * @file cowvec CLI entry (Ink + React)
 */
import React from "react";
import { render } from "ink";
import path from "node:path";
import { InspectView } from "./ui/InspectView";
import { inspectFile } from "./tools/inspect";
import { runPack } from "./tools/pack";
import { validateConfigFile } from "./tools/validate_config";
import { configPatternsLabel } from "../config";
import { createNodeFileIO } from "../storage/node";

const argv = process.argv.slice(2);
const wantsHelp = argv.length === 0 || argv.includes("--help") || argv.includes("-h") || argv[0] === "help";

// Minimal arg parsing: --config/-c <path>, everything else positional
const configPath: string | undefined = (() => {
  const idx = argv.findIndex((a) => a === "--config" || a === "-c");
  if (idx < 0) {
    return undefined;
  }
  const v = argv[idx + 1];
  if (!v) {
    console.error("Missing value for --config");
    process.exit(1);
  }
  return path.resolve(v);
})();
const positional = argv.filter((a, i) => !a.startsWith("-") && argv[i - 1] !== "--config" && argv[i - 1] !== "-c");
const [command, ...rest] = positional;

function usage(): string {
  return `\nUsage: cowvec <command> [options]\n\nCommands:\n  inspect <file>              Show the fields of a bundle and how they attach\n  pack <input.json> <out>     Build a bundle from a JSON description\n  validate-config [path]      Check a ${configPatternsLabel()} file\n\nOptions:\n  --config, -c <path>   Path to executable config\n  --help, -h            Show this help\n`;
}

async function main() {
  if (wantsHelp) {
    console.log(usage());
    return;
  }
  if (command === "inspect") {
    const file = rest[0];
    if (!file) {
      throw new Error("inspect needs a bundle path");
    }
    const res = await inspectFile(file, configPath);
    render(<InspectView file={res.file} bytes={res.bytes} rows={res.rows} />);
    return;
  }
  if (command === "pack") {
    const [input, out] = rest;
    if (!input || !out) {
      throw new Error("pack needs <input.json> <out>");
    }
    const io = createNodeFileIO(process.cwd());
    const res = await runPack(io, input, out);
    console.log(`Packed ${res.fields} fields into ${out} (${res.bytes} bytes)`);
    return;
  }
  if (command === "validate-config") {
    const file = rest[0] ?? configPath;
    const res = await validateConfigFile(file);
    if (!res.ok) {
      console.error(`Invalid config at ${file ?? configPatternsLabel()}:\n- ${res.message}`);
      process.exit(1);
    }
    console.log(`Config OK: ${file ?? configPatternsLabel()}`);
    return;
  }
  console.error(`Unknown command: ${command}`);
  console.log(usage());
  process.exit(1);
}

main().catch((e) => {
  console.error(e instanceof Error ? e.message : String(e));
  process.exit(1);
});

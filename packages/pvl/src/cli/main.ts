#!/usr/bin/env node
import { handleCompileCommand } from "./compile.js";

try {
  process.exitCode = await handleCompileCommand(process.argv.slice(2));
} catch (error) {
  console.error("Error:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
}

#!/usr/bin/env -S npx tsx
import { createProgram } from "./commands";

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error("[CLI] Unexpected error:", error);
    process.exitCode = 1;
  });

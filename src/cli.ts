#!/usr/bin/env node
// ABOUTME: Command-line entry point
// ABOUTME: Usage: mandelscope [width=120] [ll_x=-0.75 ll_y=0.1 ur_x=-0.74 ur_y=0.11] [png=1] [max_iter=255]

import { EXIT_FAILURE, main } from "./main";

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("Render failed:", error);
    process.exitCode = EXIT_FAILURE;
  }
);

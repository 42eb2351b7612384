#!/usr/bin/env node

import * as dotenv from "dotenv";
import { run } from "./cli.js";

dotenv.config();

run(process.argv).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (err: unknown) => {
    console.error("Unexpected error:", err instanceof Error ? err.message : err);
    process.exitCode = 1;
  }
);

#!/usr/bin/env node
import "dotenv/config";
import { main } from "./cli.js";

main(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  err => {
    console.error("Rename run failed:", err);
    process.exitCode = 1;
  }
);

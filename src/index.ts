#!/usr/bin/env node
import { main } from "./main.js";

process.on("uncaughtException", (err) => {
  console.error("Uncaught exception:", err);
  process.exit(1);
});

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("Failed to start fitbit-oscar:", err);
    process.exit(1);
  });

#!/usr/bin/env node
import { main } from "./downloader";

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });

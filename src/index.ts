#!/usr/bin/env node

import { hideBin } from "yargs/helpers";

import { run } from "./app";

run(hideBin(process.argv))
  .then((exitCode) => process.exit(exitCode))
  .catch((error) => {
    console.error("❌ Unhandled error:", error);
    process.exit(1);
  });

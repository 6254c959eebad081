#!/usr/bin/env node
import "dotenv/config";
import { main } from "./cli.js";

main(process.argv)
  .then((exitCode) => {
    process.exit(exitCode);
  })
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });

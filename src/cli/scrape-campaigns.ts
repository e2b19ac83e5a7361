#!/usr/bin/env node
import dotenv from "dotenv";
import { createLogger } from "../logger";
import { runCli } from "./run";

dotenv.config();

const log = createLogger();

runCli(process.argv.slice(2), process.env, { log }).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    log.fatal({ err }, "Run aborted");
    process.exitCode = 1;
  }
);

#!/usr/bin/env node
import { createCli } from "./cli/program.js";

const cli = createCli();
await cli.runExit(process.argv.slice(2));

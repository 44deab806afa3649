#!/usr/bin/env node
import { runNewsProcessorCli } from "../src/cli/news_processor.js";

const exitCode = await runNewsProcessorCli(process.argv.slice(2));
process.exit(exitCode);

#!/usr/bin/env node
import { run } from "./cli-lib";

process.exitCode = run(process.argv.slice(2));

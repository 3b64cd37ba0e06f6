#!/usr/bin/env node
import { main } from "./supply-risk.js";

process.exitCode = main(process.argv.slice(2));

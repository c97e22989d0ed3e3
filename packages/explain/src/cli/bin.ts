#!/usr/bin/env node
import { run } from "./cost-estimator.js";

process.exitCode = run(process.argv);

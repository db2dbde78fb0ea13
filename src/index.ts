#!/usr/bin/env node
/**
 * csvtex
 *
 * Generates LaTeX tables from CSV files, driven by a YAML conversion
 * description.
 *
 * Usage:
 *   csvtex <file> [outpath] [--encoding <name>] [--delimiter <char>]
 *          [--quote-char <char>] [--skip-header] [--locale <name>]
 *
 * Environment variables:
 *   CSVTEX_ENCODING  CSV encoding when --encoding is not given
 *   CSVTEX_LOCALE    Locale when --locale is not given
 */

import { runCli } from "./cli.js";

process.exitCode = await runCli(process.argv.slice(2));

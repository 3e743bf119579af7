#!/usr/bin/env node
/**
 * Decode a METAR from the command line
 * Usage: metar-decode "KTOB 252234Z 29019G29KT 10SM OVC010 01/M03 A3002"
 */

import logger from '../utils/logger';
import metarDecoderService from '../services/MetarDecoderService';

function main(argv: readonly string[]): number {
  const raw = argv.join(' ').trim();
  if (!raw) {
    logger.error('❌ No report given. Usage: metar-decode "<METAR report>"');
    return 1;
  }

  const result = metarDecoderService.decode(raw);
  if (!result.ok) {
    logger.error(`❌ ${result.error.message}`, { code: result.error.code });
    return 1;
  }

  const { report } = result;
  const output = {
    report,
    flightRules: metarDecoderService.flightRules(report),
    summary: metarDecoderService.summarize(report),
  };
  process.stdout.write(`${JSON.stringify(output, null, 2)}\n`);
  return 0;
}

process.exitCode = main(process.argv.slice(2));

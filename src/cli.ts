import { loadConfig } from './config';
import { formatReport, formatReportJson } from './services/reportFormatter';
import { analyzeTripFile } from './services/tripAnalyzer';
import { logger } from './utils/logger';

export const USAGE = 'Usage: trip-analyzer <INFILE> [--json]';

/** Runs one analysis and resolves to the process exit code. */
export const run = async (argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> => {
  const json = argv.includes('--json');
  const positional = argv.filter(arg => !arg.startsWith('--'));
  const unknown = argv.filter(arg => arg.startsWith('--') && arg !== '--json');

  if (positional.length !== 1 || unknown.length > 0) {
    console.error(USAGE);
    return 2;
  }
  const infile = positional[0];

  // Fatal messages go straight to stderr, whatever the log level
  const config = loadConfig(env);
  if (config.type === 'ERROR') {
    console.error(`${config.error.name}: ${config.error.message}`);
    return 1;
  }
  logger.setLevel(config.value.logLevel);

  // stdout carries only the document in JSON mode
  if (!json) logger.info(`INFILE: ${infile}`);
  const result = await analyzeTripFile(infile, { histogram: config.value.histogram });
  if (result.type === 'ERROR') {
    console.error(`${result.error.name}: ${result.error.message}`);
    return 1;
  }

  console.log(json ? formatReportJson(result.value) : formatReport(result.value));
  return 0;
};

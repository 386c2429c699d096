import { loadConfig } from '../src/config';
import { buildSpeechSynthesizer } from '../src/services';
import logger from '../src/util/logger';

const parseRetention = (argv: string[]): number | undefined => {
  const flag = argv.find((arg) => arg.startsWith('--retention='));
  if (!flag) {
    return undefined;
  }

  const value = Number.parseInt(flag.slice('--retention='.length), 10);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`Invalid --retention value: ${flag}`);
  }

  return value;
};

const main = async (): Promise<void> => {
  const config = loadConfig();
  const synthesizer = buildSpeechSynthesizer(config);
  const retentionSeconds = parseRetention(process.argv.slice(2)) ?? config.speech.retentionSeconds;

  const removed = await synthesizer.sweep({ retentionSeconds });

  logger.info({ removed, dir: synthesizer.dir, retentionSeconds }, 'Audio sweep complete.');
};

main().catch((error: unknown) => {
  logger.error({ err: error }, 'Audio sweep failed.');
  process.exitCode = 1;
});

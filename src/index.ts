import { logger } from '@/shared/utils';
import { EXIT_CODES, isDictationError, toError } from '@/shared/errors';
import { PreviewRenderer } from '@/modules/transcript';
import {
  DictationController,
  USAGE,
  createDictationSession,
  loadDictationConfig,
  parseCliArgs,
} from '@/modules/dictation';

async function main(): Promise<number> {
  const cli = parseCliArgs(process.argv.slice(2));
  if (cli.help) {
    process.stdout.write(USAGE);
    return EXIT_CODES.OK;
  }

  const config = loadDictationConfig(cli);
  logger.setLevel(config.logLevel);

  const preview = new PreviewRenderer(process.stderr, { enabled: config.showPreview });
  // Log lines share stderr with the preview line
  logger.setSink((line) => preview.printAbove(`${line}\n`));

  const session = createDictationSession(config, preview);
  const controller = new DictationController({ stdout: process.stdout, stderr: process.stderr });

  // First Ctrl+C stops and prints the paragraph, a second one exits immediately
  const interrupt = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    if (interrupt.signal.aborted) {
      logger.warn('Second interrupt, exiting without transcript', { signal });
      process.exit(EXIT_CODES.INTERRUPTED_TWICE);
    }
    logger.debug('Interrupt received', { signal });
    interrupt.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    return await controller.run(session, interrupt.signal);
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled rejection', toError(reason));
});

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (isDictationError(error)) {
      process.stderr.write(`✖ ${error.message}\n`);
      process.exitCode = error.exitCode;
      return;
    }
    logger.error('Dictation failed', toError(error));
    process.exitCode = EXIT_CODES.FATAL;
  });

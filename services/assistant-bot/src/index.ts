import { AddressBook } from '@contact-desk/address-book-domain';
import { runAssistant } from './application/run-assistant.js';
import { createSession } from './application/session.js';
import { loadConfig } from './infrastructure/config.js';
import { createLogger, logFatal } from './infrastructure/logger.js';
import { createCommandTable } from './interface/command-table.js';

async function main() {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  logger.info(
    { birthdayWindowDays: config.birthdayWindowDays },
    'Assistant starting',
  );

  const session = createSession({
    book: new AddressBook(),
    commands: createCommandTable({
      clock: () => new Date(),
      windowDays: config.birthdayWindowDays,
      logger,
    }),
    logger,
  });

  await runAssistant({
    input: process.stdin,
    output: process.stdout,
    session,
    logger,
  });
}

main().catch((err) => {
  logFatal(err);
  process.exit(1);
});

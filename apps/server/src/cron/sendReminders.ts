/**
 * One reminder sweep over the sign-up sheet, then exit. Meant for an external
 * scheduler running every 10 minutes:
 *
 *   npm run reminders
 */
import { getEnv, getSheetConfig, getSmtpConfig } from '../lib/env.js';
import { describeError } from '../lib/errors.js';
import { Mailer } from '../lib/mailer.js';
import { SlotStore } from '../lib/slotStore.js';
import { logSweep, runReminderSweep } from '../services/reminders.js';

async function main() {
  const env = getEnv();
  const store = new SlotStore(getSheetConfig(env));
  const mailer = new Mailer(getSmtpConfig(env));

  const result = await runReminderSweep({ store, mailer, zone: store.zone, orgName: env.ORG_NAME });
  logSweep(result);
  return result.failures.length > 0 ? 1 : 0;
}

main()
  .then((code) => process.exit(code))
  .catch((e) => {
    console.error('[reminders] Sweep aborted:', describeError(e));
    process.exit(1);
  });

import { createApp } from './app.js';
import { createRepositories } from './lib/db.js';
import { getEnv, getSheetConfig, getSmtpConfig } from './lib/env.js';
import { Mailer } from './lib/mailer.js';
import { ProfilePictureStore } from './lib/profilePictures.js';
import { SlotStore } from './lib/slotStore.js';
import { bootstrapAdminIfNeeded, promoteForcedAdmins } from './services/accounts.js';

const env = getEnv();
const { accounts, forum } = createRepositories(env);
const mailer = new Mailer(getSmtpConfig(env));

if (!env.JWT_SECRET) console.warn('[server] JWT_SECRET is not set; sign-in is disabled');
if (!mailer.configured) console.warn('[server] SMTP is not configured; confirmation emails will be skipped');

const app = createApp({
  env,
  store: new SlotStore(getSheetConfig(env)),
  mailer,
  accounts,
  forum,
  pictures: new ProfilePictureStore(env.PROFILE_PIC_DIR),
});

async function prepareAccounts() {
  const deps = { accounts, forcedAdmins: env.FORCED_ADMIN_EMAILS };
  await bootstrapAdminIfNeeded(deps, env);
  const promoted = await promoteForcedAdmins(deps);
  if (promoted > 0) console.log(`[server] Promoted ${promoted} forced admin(s)`);
}

prepareAccounts().catch((e) => {
  console.warn('[server] Account setup failed (continuing):', e);
});

app.listen(Number(env.PORT), '0.0.0.0', () => {
  console.log(`[server] listening on 0.0.0.0:${env.PORT}`);
});

// Global error handlers
process.on('uncaughtException', (err) => {
  console.error('[server] Uncaught Exception:', err);
  process.exit(1);
});

process.on('unhandledRejection', (reason, promise) => {
  console.error('[server] Unhandled Rejection at:', promise, 'reason:', reason);
  process.exit(1);
});

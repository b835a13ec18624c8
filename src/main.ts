/*

  Trading engine entry point.

  Paper trading is enabled unless PAPER_TRADING is explicitly set to something
  other than "true". Persistence is optional: without FIREBASE_PROJECT_ID the
  engine runs with persistence-dependent features disabled.

*/

import { main } from './app';

await main();

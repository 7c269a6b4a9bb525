/**
 * Jest setup: run registered cleanup tasks after every test so no fleet or
 * timer outlives the test that created it
 */

import { runCleanupTasks } from './cleanup';

afterEach(async () => {
  await runCleanupTasks();
});

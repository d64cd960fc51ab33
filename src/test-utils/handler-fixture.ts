/**
 * Handler module loaded by CLI tests.
 */

import type { QueuedJob } from '../schemas/job.js';

export default async function (job: QueuedJob): Promise<void> {
  await Promise.resolve();
  if (job.payload.question === 'fail') throw new Error('reading failed');
}

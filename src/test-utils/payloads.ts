/**
 * Shared test utilities for building reading-job payloads.
 */

import {
  createJobPayload,
  type JobPayload,
  type JobPayloadInput,
} from '../schemas/payload.js';

/** Fixed user id used across tests. */
export const TEST_USER_ID = '3f2b8c1e-9d4a-4e7b-8a6c-1f0e2d3c4b5a';

let counter = 0;

/** Build a payload with sequential job ids (`job-1`, `job-2`, …) unless overridden. */
export function makePayload(
  overrides: Partial<JobPayloadInput> = {},
): JobPayload {
  counter += 1;
  return createJobPayload({
    jobId: `job-${String(counter)}`,
    userId: TEST_USER_ID,
    question: 'What should I focus on this week?',
    cardCount: 3,
    promptVersion: 'v2025-11-20-a',
    createdAt: new Date('2025-11-20T10:00:00.000Z'),
    ...overrides,
  });
}

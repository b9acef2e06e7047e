/**
 * Shared test helpers for poller test modules.
 */

import type { Build } from '../../src/types';

export const BUILD_URL =
  'https://api.buildkite.com/v2/organizations/my-org/pipelines/my-pipeline/builds/7';

export function makeBuild(overrides: Partial<Build> = {}): Build {
  return {
    id: '42',
    number: 7,
    url: BUILD_URL,
    web_url: 'https://buildkite.com/my-org/my-pipeline/builds/7',
    state: 'scheduled',
    finished_at: null,
    raw: { id: '42', number: 7 },
    ...overrides,
  };
}

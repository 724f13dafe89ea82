/**
 * Reporting steps that run after the verdict is known.
 */

import { errorMessage } from '@matrix-ci/core';

/**
 * Run a reporting step whose failure must not fail the job: the verdict and
 * outputs are already set, so an error only becomes a warning.
 */
export async function publishQuietly(
    what: string,
    step: () => Promise<void>,
    warn: (message: string) => void
): Promise<boolean> {
    try {
        await step();
        return true;
    } catch (error) {
        warn(`Failed to ${what}: ${errorMessage(error)}`);
        return false;
    }
}

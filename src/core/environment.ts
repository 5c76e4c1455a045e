/**
 * Environment Detection
 *
 * Detects how strata is being run (CI, headless, debug).
 * Used by the logger to pick between compact lines and JSON entries.
 */

/**
 * CI environment variable names to check.
 */
const CI_ENV_VARS = [
    'CI',
    'CONTINUOUS_INTEGRATION',
    'GITHUB_ACTIONS',
    'GITLAB_CI',
    'CIRCLECI',
    'BUILDKITE',
    'TF_BUILD',
];

/**
 * Detect if running in a CI/headless environment.
 *
 * Checks for:
 * - STRATA_HEADLESS=true environment variable
 * - Common CI environment variables
 * - No TTY available
 */
export function isCi(env: NodeJS.ProcessEnv = process.env): boolean {

    if (env['STRATA_HEADLESS'] === 'true') {

        return true;

    }

    for (const envVar of CI_ENV_VARS) {

        if (env[envVar]) {

            return true;

        }

    }

    if (!process.stdout.isTTY) {

        return true;

    }

    return false;

}

/**
 * Check if debug output is enabled.
 */
export function isDebug(env: NodeJS.ProcessEnv = process.env): boolean {

    const debug = env['STRATA_DEBUG'];

    return debug === '1' || debug === 'true';

}

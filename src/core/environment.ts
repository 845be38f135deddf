/**
 * Runtime environment checks.
 *
 * The headless logger uses them to pick its default level and whether
 * console lines are colored.
 */

const CI_MARKERS = [
    'CI',
    'CONTINUOUS_INTEGRATION',
    'GITHUB_ACTIONS',
    'GITLAB_CI',
    'BUILDKITE',
    'JENKINS_URL',
];


/**
 * True under CI, with `TABLEDRIFT_HEADLESS=true`, or when stdout is not
 * a terminal.
 */
export function isCi(env: NodeJS.ProcessEnv = process.env): boolean {

    if (env['TABLEDRIFT_HEADLESS'] === 'true') return true;

    return CI_MARKERS.some((name) => Boolean(env[name])) || !process.stdout.isTTY;

}

/**
 * True with `NODE_ENV=development` or `TABLEDRIFT_DEV=true`.
 */
export function isDev(env: NodeJS.ProcessEnv = process.env): boolean {

    return env['NODE_ENV'] === 'development' || env['TABLEDRIFT_DEV'] === 'true';

}

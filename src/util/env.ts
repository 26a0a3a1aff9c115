export function isTestEnv(env: NodeJS.ProcessEnv = process.env): boolean {
    // JEST_WORKER_ID is set by Jest; also honor NODE_ENV=test
    return !!(env.JEST_WORKER_ID || env.NODE_ENV === 'test');
}

export function isInteractive(): boolean {
    return !!process.stdout.isTTY && !process.env.CI && !isTestEnv();
}

export function normalizeArgv(rawArgv: string[]): string[] {
  // `npm run cli -- <args>` can leave a leading `--` in place
  if (rawArgv[2] === '--') {
    return [rawArgv[0], rawArgv[1], ...rawArgv.slice(3)];
  }
  return rawArgv;
}

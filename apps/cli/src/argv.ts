export function normalizeArgv(rawArgv: string[]): string[] {
  // npm run forwards args as: node main.ts -- <args>
  if (rawArgv[2] === '--') {
    return [...rawArgv.slice(0, 2), ...rawArgv.slice(3)];
  }
  return rawArgv;
}

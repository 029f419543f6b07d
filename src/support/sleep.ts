export function sleepMs(ms: number) {
  return new Promise<void>(resolve => setTimeout(resolve, ms));
}

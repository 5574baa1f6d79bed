import { config } from './config';

let testNow: Date | null = null;

// Pins the clock for session-freshness tests; ignored outside NODE_ENV=test
export function setTestNow(date: Date | null): void {
  if (config.isTest) {
    testNow = date;
  }
}

export function getNow(): Date {
  if (config.isTest && testNow) {
    return testNow;
  }
  return new Date();
}

export function nowMs(): number {
  return getNow().getTime();
}

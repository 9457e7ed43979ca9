export interface ClockPort {
  nowIso(): string;
}

export type SleepFn = (ms: number) => Promise<void>;

export class SystemClock implements ClockPort {
  nowIso(): string {
    return new Date().toISOString();
  }
}

export const systemSleep: SleepFn = (ms) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

export type Sleep = (ms: number) => Promise<void>;

export function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

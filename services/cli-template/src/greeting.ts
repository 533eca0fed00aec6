export const GREETING = "Hello, world!";

export interface LineWriter {
  write(chunk: string): unknown;
}

export function printGreeting(out: LineWriter = process.stdout): void {
  out.write(`${GREETING}\n`);
}

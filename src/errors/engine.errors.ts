export class DeadlineExceededError extends Error {
  deadlineMs: number;

  constructor(label: string, deadlineMs: number) {
    super(`${label} exceeded its deadline of ${deadlineMs}ms.`);
    this.name = "DeadlineExceededError";
    this.deadlineMs = deadlineMs;
  }
}

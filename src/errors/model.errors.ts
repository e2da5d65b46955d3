export class ScanResultInvariantError extends Error {
  constructor(tool: string, count: number) {
    super(`Scan result for ${tool} is marked failed but carries ${count} vulnerabilities.`);
    this.name = "ScanResultInvariantError";
  }
}

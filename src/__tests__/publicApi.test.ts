import assert from "node:assert/strict";
import { test } from "node:test";
import {
  BACKEND_CATEGORIES,
  SCAN_CATEGORIES,
  SEVERITIES,
  ScanResult,
  aggregateToStructured,
  createVulnerability,
  exceedsThreshold,
  isScanCategory,
  mapSeverity,
  severityFromCvss,
  summarizeAggregate
} from "../index.js";

test("a third-party scanner can build normalized findings from the package entry", () => {
  const finding = createVulnerability({
    id: "SC2086:deploy.sh:4",
    title: "Double quote to prevent globbing",
    description: "Unquoted variable expansion",
    severity: mapSeverity("warning"),
    filePath: "deploy.sh",
    lineNumber: 4,
    tool: "shellcheck",
    ruleId: "SC2086"
  });
  const critical = createVulnerability({
    id: "CVE-2026-0001:libfoo@1.0.0",
    title: "libfoo overflow",
    description: "",
    severity: severityFromCvss(9.1),
    tool: "shellcheck"
  });
  const result = new ScanResult({
    tool: "shellcheck",
    target: "/repo",
    scanType: "custom",
    scanDuration: 0.4,
    timestamp: "2026-06-01T12:00:00.000Z",
    vulnerabilities: [finding, critical]
  });
  const aggregate = {
    target: "/repo",
    startedAt: "2026-06-01T12:00:00.000Z",
    completedAt: "2026-06-01T12:00:01.000Z",
    categories: {},
    plugins: [result]
  };

  assert.equal(finding.severity, "MEDIUM");
  assert.equal(critical.severity, "CRITICAL");
  assert.deepEqual(summarizeAggregate(aggregate).by_severity, { CRITICAL: 1, HIGH: 0, MEDIUM: 1, LOW: 0, INFO: 0 });
  assert.equal(exceedsThreshold(aggregate, "HIGH"), true);
  assert.equal(aggregateToStructured(aggregate).plugin_results[0]?.vulnerabilities[0]?.rule_id, "SC2086");
});

test("the package entry lists the severity scale and scan categories", () => {
  assert.deepEqual([...SEVERITIES], ["CRITICAL", "HIGH", "MEDIUM", "LOW", "INFO"]);
  assert.deepEqual([...BACKEND_CATEGORIES], ["sast", "sca", "secrets", "iac", "container"]);
  assert.equal(SCAN_CATEGORIES.includes("custom"), true);
  assert.equal(isScanCategory("fuzzing"), false);
});

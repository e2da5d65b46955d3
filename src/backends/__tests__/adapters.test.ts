import assert from "node:assert/strict";
import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { test } from "node:test";
import { BanditBackend } from "../adapters/bandit.js";
import { CheckovBackend } from "../adapters/checkov.js";
import { NpmAuditBackend } from "../adapters/npmAudit.js";
import { OsvScannerBackend } from "../adapters/osvScanner.js";
import { TfsecBackend } from "../adapters/tfsec.js";
import { TrivyBackend } from "../adapters/trivy.js";
import { fakeRunner, resolveBare } from "./fakeRunner.js";

async function tempProject(t: { after: (fn: () => Promise<void>) => void }, files: Record<string, string>): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "scanmesh-adapter-"));
  t.after(() => rm(dir, { recursive: true, force: true }));
  for (const [name, content] of Object.entries(files)) {
    await mkdir(path.dirname(path.join(dir, name)), { recursive: true });
    await writeFile(path.join(dir, name), content, "utf-8");
  }
  return dir;
}

test("bandit skips targets without python files", async (t) => {
  const dir = await tempProject(t, { "index.js": "console.log(1);\n" });
  const fake = fakeRunner({ code: 0 });
  const result = await new BanditBackend({ runner: fake.runner, resolveTool: resolveBare }).execute(dir);
  assert.equal(result.status, "no_issues_found");
  assert.equal(result.metadata.reason, "no files matching .py");
  assert.equal(fake.calls.length, 0);
});

test("bandit parses issues from a python project", async (t) => {
  const dir = await tempProject(t, { "app.py": "import pickle\n" });
  const fake = fakeRunner({
    code: 1,
    stdout: JSON.stringify({
      results: [
        {
          test_id: "B403",
          test_name: "blacklist",
          filename: path.join(dir, "app.py"),
          line_number: 1,
          issue_severity: "LOW",
          issue_text: "Consider possible security implications associated with pickle module.",
          issue_cwe: { id: 502, link: "https://cwe.mitre.org/data/definitions/502.html" },
          more_info: "https://example.test/b403"
        }
      ]
    })
  });
  const result = await new BanditBackend({ runner: fake.runner, resolveTool: resolveBare, excludePaths: [] }).execute(dir);
  assert.deepEqual(fake.calls[0]?.args, ["-r", dir, "-f", "json", "-q"]);
  const [vuln] = result.vulnerabilities;
  assert.equal(vuln?.ruleId, "B403");
  assert.equal(vuln?.severity, "LOW");
  assert.equal(vuln?.cwe, "CWE-502");
  assert.equal(vuln?.filePath, "app.py");
  assert.equal(vuln?.recommendation, "See https://example.test/b403");
});

test("osv-scanner treats 'no package sources found' as an empty scan", async () => {
  const fake = fakeRunner({ code: 128, stderr: "No package sources found, --help for usage information.\n" });
  const result = await new OsvScannerBackend({ runner: fake.runner, resolveTool: resolveBare }).execute("/repo");
  assert.equal(result.status, "no_issues_found");
  assert.equal(result.metadata.exit_code, 128);
});

test("osv-scanner reads CVSS scores and fixed versions", async () => {
  const fake = fakeRunner({
    code: 1,
    stdout: JSON.stringify({
      results: [
        {
          source: { path: "/repo/package-lock.json", type: "lockfile" },
          packages: [
            {
              package: { name: "lodash", version: "4.17.15", ecosystem: "npm" },
              vulnerabilities: [
                {
                  id: "GHSA-test-0001",
                  summary: "Prototype pollution",
                  details: "Prototype pollution in zipObjectDeep.",
                  severity: [{ type: "CVSS_V3", score: "CVSS:3.1/AV:N/AC:L/PR:N/UI:N/S:U/C:H/I:H/A:H 9.8" }],
                  affected: [{ ranges: [{ type: "SEMVER", events: [{ introduced: "0" }, { fixed: "4.17.21" }] }] }],
                  database_specific: { cwe_ids: ["CWE-1321"] },
                  references: [{ type: "ADVISORY", url: "https://example.test/ghsa-0001" }]
                }
              ]
            }
          ]
        }
      ]
    })
  });
  const result = await new OsvScannerBackend({ runner: fake.runner, resolveTool: resolveBare }).execute("/repo");
  const [vuln] = result.vulnerabilities;
  assert.equal(vuln?.id, "GHSA-test-0001:lodash@4.17.15");
  assert.equal(vuln?.title, "Prototype pollution in lodash@4.17.15");
  assert.equal(vuln?.severity, "CRITICAL");
  assert.equal(vuln?.cvssScore, 9.8);
  assert.equal(vuln?.cwe, "CWE-1321");
  assert.equal(vuln?.filePath, "package-lock.json");
  assert.equal(vuln?.recommendation, "Upgrade lodash to 4.17.21 or later.");
  assert.deepEqual(vuln?.references, ["https://example.test/ghsa-0001"]);
});

test("npm audit needs a package.json", async (t) => {
  const dir = await tempProject(t, { "README.md": "# test\n" });
  const fake = fakeRunner({ code: 0 });
  const result = await new NpmAuditBackend({ runner: fake.runner, resolveTool: resolveBare }).execute(dir);
  assert.equal(result.metadata.reason, "no package.json found");
  assert.equal(fake.calls.length, 0);
});

test("npm audit runs in the project directory and dedupes advisories", async (t) => {
  const dir = await tempProject(t, { "package.json": "{\"name\":\"demo\"}\n" });
  const advisory = {
    source: 1001,
    name: "minimist",
    title: "Prototype Pollution in minimist",
    url: "https://example.test/advisories/GHSA-test-0002",
    severity: "moderate",
    cwe: ["CWE-1321"],
    cvss: { score: 5.6 },
    range: "<1.2.6"
  };
  const fake = fakeRunner({
    code: 1,
    stdout: JSON.stringify({
      vulnerabilities: {
        minimist: {
          name: "minimist",
          severity: "moderate",
          via: [advisory, advisory],
          fixAvailable: { name: "minimist", version: "1.2.8" }
        },
        mkdirp: { name: "mkdirp", severity: "moderate", via: ["minimist"], fixAvailable: true }
      }
    })
  });
  const result = await new NpmAuditBackend({ runner: fake.runner, resolveTool: resolveBare }).execute(dir);
  assert.equal(fake.calls[0]?.command, "npm");
  assert.deepEqual(fake.calls[0]?.args, ["audit", "--json"]);
  assert.equal(fake.calls[0]?.cwd, dir);
  assert.equal(result.vulnerabilities.length, 1);
  const [vuln] = result.vulnerabilities;
  assert.equal(vuln?.id, "GHSA-test-0002:minimist");
  assert.equal(vuln?.severity, "MEDIUM");
  assert.equal(vuln?.cvssScore, 5.6);
  assert.equal(vuln?.recommendation, "Upgrade minimist to 1.2.8.");
  assert.equal(vuln?.description, "minimist <1.2.6 is affected by GHSA-test-0002.");
});

test("npm audit reports its own error payload as a failed scan", async (t) => {
  const dir = await tempProject(t, { "package.json": "{\"name\":\"demo\"}\n" });
  const fake = fakeRunner({
    code: 1,
    stdout: JSON.stringify({
      error: {
        code: "ENOLOCK",
        summary: "This command requires an existing lockfile.",
        detail: "Try creating one first with: npm i --package-lock-only"
      }
    })
  });
  const result = await new NpmAuditBackend({ runner: fake.runner, resolveTool: resolveBare }).execute(dir);
  assert.equal(result.status, "failed");
  assert.equal(result.error, "npm-audit: This command requires an existing lockfile.");
  assert.equal(result.vulnerabilities.length, 0);
});

test("checkov scans a single file with -f and reads every framework report", async (t) => {
  const dir = await tempProject(t, { "main.tf": "resource \"aws_s3_bucket\" \"b\" {}\n" });
  const target = path.join(dir, "main.tf");
  const failedCheck = (checkId: string) => ({
    check_id: checkId,
    check_name: "Ensure the bucket is encrypted",
    file_path: "/main.tf",
    file_line_range: [1, 1],
    resource: "aws_s3_bucket.b",
    severity: null,
    guideline: "https://example.test/guide"
  });
  const fake = fakeRunner({
    code: 1,
    stdout: JSON.stringify([
      { check_type: "terraform", results: { failed_checks: [failedCheck("CKV_AWS_19")] } },
      { check_type: "secrets", results: { failed_checks: [failedCheck("CKV_SECRET_2")] } }
    ])
  });
  const result = await new CheckovBackend({ runner: fake.runner, resolveTool: resolveBare }).execute(target);
  assert.deepEqual(fake.calls[0]?.args, ["-f", target, "--output", "json", "--quiet", "--compact"]);
  assert.deepEqual(
    result.vulnerabilities.map((vuln) => vuln.id),
    ["CKV_AWS_19:main.tf:aws_s3_bucket.b", "CKV_SECRET_2:main.tf:aws_s3_bucket.b"]
  );
  assert.equal(result.vulnerabilities[0]?.severity, "INFO");
  assert.equal(result.vulnerabilities[0]?.lineNumber, 1);
});

test("tfsec accepts null results", async (t) => {
  const dir = await tempProject(t, { "infra/main.tf": "terraform {}\n" });
  const fake = fakeRunner({ code: 0, stdout: JSON.stringify({ results: null }) });
  const result = await new TfsecBackend({ runner: fake.runner, resolveTool: resolveBare }).execute(dir);
  assert.deepEqual(fake.calls[0]?.args, [dir, "--format", "json", "--no-colour"]);
  assert.equal(result.status, "no_issues_found");
});

test("trivy scans images by reference and reads vulnerabilities", async () => {
  const fake = fakeRunner({
    code: 0,
    stdout: JSON.stringify({
      Results: [
        {
          Target: "alpine:3.19 (alpine 3.19.1)",
          Vulnerabilities: [
            {
              VulnerabilityID: "CVE-2099-0001",
              PkgName: "openssl",
              InstalledVersion: "3.1.4-r0",
              FixedVersion: "3.1.4-r5",
              Severity: "HIGH",
              Title: "openssl: test issue",
              CweIDs: ["CWE-400"],
              CVSS: { nvd: { V3Score: 7.5 }, redhat: { V3Score: 5.3 } },
              References: ["https://example.test/cve-2099-0001"]
            }
          ]
        }
      ]
    })
  });
  const result = await new TrivyBackend({ runner: fake.runner, resolveTool: resolveBare }).execute("alpine:3.19");
  assert.deepEqual(fake.calls[0]?.args, ["image", "--format", "json", "--quiet", "alpine:3.19"]);
  const [vuln] = result.vulnerabilities;
  assert.equal(vuln?.id, "CVE-2099-0001:openssl@3.1.4-r0");
  assert.equal(vuln?.cvssScore, 7.5);
  assert.equal(vuln?.severity, "HIGH");
  assert.equal(vuln?.recommendation, "Upgrade openssl to 3.1.4-r5.");
});

test("trivy scans directories with fs and reads misconfigurations", async (t) => {
  const dir = await tempProject(t, { Dockerfile: "FROM alpine\n" });
  const fake = fakeRunner({
    code: 0,
    stdout: JSON.stringify({
      Results: [
        {
          Target: "Dockerfile",
          Misconfigurations: [
            {
              AVDID: "AVD-DS-0002",
              Title: "Image user should not be 'root'",
              Message: "Specify at least 1 USER command in Dockerfile.",
              Severity: "HIGH",
              Resolution: "Add 'USER <non root user name>' line to the Dockerfile",
              CauseMetadata: { StartLine: 1 }
            }
          ]
        }
      ]
    })
  });
  const result = await new TrivyBackend({ runner: fake.runner, resolveTool: resolveBare, excludePaths: [] }).execute(dir);
  assert.deepEqual(fake.calls[0]?.args, ["fs", "--format", "json", "--quiet", dir]);
  const [vuln] = result.vulnerabilities;
  assert.equal(vuln?.id, "AVD-DS-0002:Dockerfile:1");
  assert.equal(vuln?.description, "Specify at least 1 USER command in Dockerfile.");
  assert.equal(vuln?.lineNumber, 1);
});

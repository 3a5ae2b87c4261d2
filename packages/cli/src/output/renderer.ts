import pc from 'picocolors';
import type { SessionFailure, SessionReport } from '@faultline/core';
import type { PatchOutcome } from '@faultline/repo';
import type { EnvironmentHandle, TestVerdict, VerdictRecord } from '@faultline/shared';

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  renderSession(report: SessionReport): void {
    if (this.isJson) {
      console.log(JSON.stringify(report, null, 2));
      return;
    }

    const headline = report.success ? pc.green('✅ Session succeeded.') : pc.red('❌ Session failed.');
    console.log(`\n${headline}`);
    console.log(`  Run ID: ${report.runId}`);
    if (report.summary.instanceId) {
      console.log(`  Instance: ${report.summary.instanceId}`);
    }
    console.log(`  Final state: ${report.finalState}`);

    this.renderRecord('Defect (expected to fail)', report.summary.defect);
    this.renderRecord('Baseline (expected to pass)', report.summary.baseline);
    if (report.summary.repair) {
      this.renderRecord('Repair (expected to pass)', report.summary.repair);
    }

    if (report.primaryError) {
      this.renderFailure('Error', report.primaryError);
    }
    if (report.cleanupError) {
      this.renderFailure('Cleanup', report.cleanupError);
      console.log(`  The repository may not be on its original revision.`);
    }
  }

  renderPatch(outcome: PatchOutcome): void {
    if (this.isJson) {
      console.log(JSON.stringify(outcome, null, 2));
      return;
    }

    if (outcome.status === 'applied') {
      console.log(`\n${pc.green(`✅ Patch applied with ${outcome.strategy}.`)}`);
      if (outcome.filesChanged.length > 0) {
        console.log(pc.bold('\nChanged files:'));
        outcome.filesChanged.slice(0, 10).forEach((file) => console.log(`  - ${file}`));
        if (outcome.filesChanged.length > 10) {
          console.log(`  ... and ${outcome.filesChanged.length - 10} more.`);
        }
      }
      return;
    }

    console.log(`\n${pc.red('❌ No patch strategy succeeded.')}`);
    console.log(pc.bold('\nAttempts:'));
    for (const attempt of outcome.attempts) {
      const reason = attempt.error ?? (attempt.stderr.trim() || `exit code ${attempt.exitCode}`);
      console.log(`  - ${attempt.strategy}: ${reason}`);
    }
  }

  renderVerdict(verdict: TestVerdict): void {
    const record = Object.fromEntries(verdict.results);
    if (this.isJson) {
      console.log(
        JSON.stringify(
          { policy: verdict.policy, results: record, artifacts: [...verdict.artifacts.values()] },
          null,
          2,
        ),
      );
      return;
    }

    this.renderRecord(verdict.policy === 'expect-fail' ? 'Expected to fail' : 'Expected to pass', record);
    const logs = [...verdict.artifacts.values()].filter((a) => verdict.results.get(a.testId) !== true);
    if (logs.length > 0) {
      console.log(pc.bold('\nLogs:'));
      logs.forEach((a) => console.log(`  - ${a.logPath}`));
    }
  }

  renderEnvironment(environment: EnvironmentHandle): void {
    if (this.isJson) {
      console.log(JSON.stringify(environment, null, 2));
      return;
    }
    console.log(`${pc.green('✅')} Environment ${environment.name} is ready at ${environment.path}`);
  }

  private renderRecord(title: string, record: VerdictRecord): void {
    const entries = Object.entries(record);
    console.log(pc.bold(`\n${title}:`));
    if (entries.length === 0) {
      console.log(pc.gray('  No tests.'));
      return;
    }
    for (const [testId, matched] of entries) {
      console.log(`  ${matched ? pc.green('✔') : pc.red('✖')} ${testId}`);
    }
    const matched = entries.filter(([, ok]) => ok).length;
    console.log(`  ${matched}/${entries.length} matched`);
  }

  private renderFailure(title: string, failure: SessionFailure): void {
    console.log(`  ${pc.bold(`${title}:`)} [${failure.category}] ${failure.code}: ${failure.message}`);
  }

  log(message: string): void {
    // JSON mode keeps stdout to the result document
    if (!this.isJson) {
      console.log(pc.gray(message));
    }
  }
}

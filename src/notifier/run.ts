#!/usr/bin/env node
/**
 * Notifier executable entry point
 * Called by the GitHub Actions workflow on pull request, review and comment events
 */

import * as core from '@actions/core';
import { buildConfig } from '../shared/config.js';
import { errorMessage } from '../shared/errors.js';
import { Notifier } from './index.js';
import type { NotifierReport } from './index.js';

function writeOutputs(report: NotifierReport): void {
  core.setOutput('status', report.status);
  core.setOutput('delivered_count', report.summary.delivered);
  core.setOutput('failed_count', report.summary.failed);
  core.setOutput('skipped_count', report.summary.unmapped);
  core.setOutput('results_json', JSON.stringify(report.results));
}

async function main() {
  console.log('--- SCRIPT STARTED ---');

  const config = buildConfig(process.argv.slice(2), process.env, {
    userMappingB64: core.getInput('user_mapping_b64')
  });

  if (config.discordToken) {
    core.setSecret(config.discordToken);
  }

  const notifier = new Notifier(config);
  const report = await notifier.run();

  const { delivered, unmapped, failed } = report.summary;
  console.log(
    `Notification run ${report.status}: ${delivered} delivered, ${failed} failed, ${unmapped} unmapped`
  );

  writeOutputs(report);
}

// Notification problems never fail the workflow
main().catch(error => {
  console.error(`Notifier failed: ${errorMessage(error)}`);
});

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ALL_AVAILABLE, MockAdapter } from '@jobfit-verdict/core';
import { batchCommand } from '../src/commands/batch';
import { evaluateCommand } from '../src/commands/evaluate';
import { validateCommand } from '../src/commands/validate';
import { validateLocationCommand } from '../src/commands/validate-location';
import { versionCommand } from '../src/commands/version';

const GOOD_RESPONSE = [
  'CV-to-role match: Good match',
  'Application narrative: I have run payment platforms for eight years.',
].join('\n');

let dir: string;

function write(name: string, content: string): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, content);
  return file;
}

function jobFile(name: string, jobId: string, location: string, description: string): string {
  return write(
    name,
    [
      `jobId: ${jobId}`,
      'candidateProfile: Senior backend engineer with payments experience.',
      `metadataLocation: ${location}`,
      `jobDescription: ${description}`,
      '',
    ].join('\n')
  );
}

function printedJson(): unknown {
  const output = vi
    .mocked(console.log)
    .mock.calls.map(call => String(call[0])).find(line => line.startsWith('{'));
  if (output === undefined) {
    throw new Error('no JSON printed');
  }
  return JSON.parse(output);
}

function mockRunner(reply: string) {
  const client = new MockAdapter();
  client.setDefaultResponse(reply);
  return { client, availability: ALL_AVAILABLE };
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'jobfit-cli-'));
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('evaluate command', () => {
  it('prints the verdict as JSON and exits 0', async () => {
    const config = write('jobfit.config.yaml', 'schemaVersion: "1.0.0"\nmatching:\n  runs: 1\n');
    const job = jobFile('acme.job.yaml', 'acme-1', 'Frankfurt', 'Payments team in Frankfurt.');

    const code = await evaluateCommand(job, { config, json: true }, mockRunner(GOOD_RESPONSE));

    expect(code).toBe(0);
    expect(printedJson()).toMatchObject({
      jobId: 'acme-1',
      match: { status: 'ok', finalMatchLevel: 'Good' },
      location: { conflictDetected: false, authoritativeLocation: 'Frankfurt' },
    });
  });

  it('exits 1 when no run produced a match level', async () => {
    const config = write('jobfit.config.yaml', 'schemaVersion: "1.0.0"\nmatching:\n  runs: 1\n  retriesPerRun: 1\n');
    const job = jobFile('acme.job.yaml', 'acme-2', 'Frankfurt', 'Payments team in Frankfurt.');

    expect(await evaluateCommand(job, { config }, mockRunner('No idea.'))).toBe(1);
  });

  it('exits 1 on an invalid config', async () => {
    const config = write('jobfit.config.yaml', 'schemaVersion: "2.0.0"\n');
    const job = jobFile('acme.job.yaml', 'acme-3', 'Frankfurt', 'Payments team in Frankfurt.');

    expect(await evaluateCommand(job, { config }, mockRunner(GOOD_RESPONSE))).toBe(1);
  });
});

describe('batch command', () => {
  it('writes artifacts for every matching job file', async () => {
    const config = write('jobfit.config.yaml', 'schemaVersion: "1.0.0"\nmatching:\n  runs: 1\n');
    jobFile('a.job.yaml', 'job-a', 'Frankfurt', 'Payments team in Frankfurt.');
    jobFile('b.job.yaml', 'job-b', 'Berlin', 'Platform team in Berlin.');
    const out = path.join(dir, 'outputs');

    const code = await batchCommand(`${dir}/*.job.yaml`, { config, out }, mockRunner(GOOD_RESPONSE));

    expect(code).toBe(0);
    const [runDir] = fs.readdirSync(out);
    expect(fs.readdirSync(path.join(out, runDir)).sort()).toEqual(['job-a', 'job-b', 'summary.json']);
    const summary = JSON.parse(fs.readFileSync(path.join(out, runDir, 'summary.json'), 'utf-8'));
    expect(summary).toMatchObject({ totalJobs: 2, matchLevels: { Good: 2 } });
  });

  it('exits 1 when nothing matches', async () => {
    const config = write('jobfit.config.yaml', 'schemaVersion: "1.0.0"\n');
    expect(await batchCommand(`${dir}/*.job.yaml`, { config, out: dir }, mockRunner(GOOD_RESPONSE))).toBe(1);
  });
});

describe('validate-location command', () => {
  it('reports a conflict found in the description', async () => {
    const config = write('jobfit.config.yaml', 'schemaVersion: "1.0.0"\n');
    const description = write('description.txt', 'The team works from our Pune office. Pune is our largest site.');

    const code = await validateLocationCommand('Frankfurt', description, { config, json: true }, mockRunner(''));

    expect(code).toBe(0);
    expect(printedJson()).toMatchObject({
      conflictDetected: true,
      authoritativeLocation: 'Pune, India',
      riskLevel: 'critical',
    });
  });

  it('exits 1 for a missing description file', async () => {
    const config = write('jobfit.config.yaml', 'schemaVersion: "1.0.0"\n');
    expect(await validateLocationCommand('Frankfurt', path.join(dir, 'absent.txt'), { config })).toBe(1);
  });
});

describe('validate command', () => {
  it('passes a valid config', async () => {
    const config = write('jobfit.config.yaml', 'schemaVersion: "1.0.0"\nllm:\n  provider: mock\n');
    expect(await validateCommand({ config })).toBe(0);
  });

  it('fails a config with a broken prompt override', async () => {
    write('match.yaml', 'metadata:\n  name: broken\ntemplate: "{cv} only"\n');
    const config = write('jobfit.config.yaml', 'schemaVersion: "1.0.0"\nmatching:\n  promptPath: match.yaml\n');
    expect(await validateCommand({ config })).toBe(1);
  });

  it('fails a missing explicit config', async () => {
    expect(await validateCommand({ config: path.join(dir, 'absent.yaml') })).toBe(1);
  });
});

describe('schema-version command', () => {
  it('lists the current version', () => {
    expect(versionCommand()).toBe(0);
    expect(console.log).toHaveBeenCalledWith('Supported Versions:');
  });
});

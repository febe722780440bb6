import { describe, expect, it } from 'vitest';
import { HybridLocationValidator } from '../src/location/HybridLocationValidator';
import { ALL_AVAILABLE, LLM_UNAVAILABLE } from '../src/llm/availability';
import { EvaluationCancelledError } from '../src/errors';
import { ScriptedEvaluationClient } from './helpers';

function validatorWith(client: ScriptedEvaluationClient, available = true): HybridLocationValidator {
  return new HybridLocationValidator(client, available ? ALL_AVAILABLE : LLM_UNAVAILABLE);
}

describe('HybridLocationValidator gazetteer phase', () => {
  it('flags a job that repeatedly names a city on another continent', async () => {
    const client = new ScriptedEvaluationClient();
    const body =
      'Join our engineering hub in Pune, India. The Pune team owns the platform. Relocation support to Pune is available.';
    const analysis = await validatorWith(client).validate('Frankfurt', body);

    expect(analysis).toMatchObject({
      conflictDetected: true,
      authoritativeLocation: 'Pune, India',
      confidence: 0.85,
      riskLevel: 'critical',
      method: 'gazetteer',
      reasoning: 'Different city mentioned in job description: Pune, India',
      extractedCities: ['pune'],
      overrides: [],
    });
    expect(client.prompts).toHaveLength(0);
  });

  it('confirms the declared city when the body names it', async () => {
    const analysis = await validatorWith(new ScriptedEvaluationClient()).validate(
      'Berlin, Germany',
      'Wir suchen Verstärkung für unser Team in Berlin.'
    );

    expect(analysis.conflictDetected).toBe(false);
    expect(analysis.confidence).toBeGreaterThanOrEqual(0.9);
    expect(analysis.authoritativeLocation).toBe('Berlin, Germany');
    expect(analysis.riskLevel).toBe('none');
  });

  it('matches German spelling variants of the declared city', async () => {
    const analysis = await validatorWith(new ScriptedEvaluationClient()).validate(
      'Munich, Germany',
      'Für unser Büro in München suchen wir eine Entwicklerin.'
    );

    expect(analysis).toMatchObject({ conflictDetected: false, confidence: 0.95, method: 'gazetteer' });
    expect(analysis.reasoning).toBe('Same city "Munich" found in job description');
  });

  it('keeps the metadata location when no city is mentioned', async () => {
    const analysis = await validatorWith(new ScriptedEvaluationClient()).validate(
      'Hamburg',
      'We build trading software. Fully remote within the team.'
    );

    expect(analysis).toMatchObject({
      conflictDetected: false,
      authoritativeLocation: 'Hamburg',
      confidence: 0.95,
      riskLevel: 'none',
      reasoning: 'No specific cities mentioned in job description - using metadata location',
    });
  });

  it('does not read Essen as a city in running German text', async () => {
    const analysis = await validatorWith(new ScriptedEvaluationClient()).validate(
      'Frankfurt',
      'Wir bieten flexible Arbeitszeiten, kostenloses Essen und Getränke.'
    );

    expect(analysis).toMatchObject({
      conflictDetected: false,
      authoritativeLocation: 'Frankfurt',
      method: 'gazetteer',
      extractedCities: [],
    });
  });

  it('picks the most mentioned city as authoritative', async () => {
    const analysis = await validatorWith(new ScriptedEvaluationClient()).validate(
      'Berlin',
      'Offices in London and Paris, with most work in Paris.'
    );

    expect(analysis.authoritativeLocation).toBe('Paris, France');
    expect(analysis.riskLevel).toBe('critical');
  });
});

describe('HybridLocationValidator adjudication phase', () => {
  it('accepts a grounded LLM conflict', async () => {
    const client = new ScriptedEvaluationClient([
      'CONFLICT: yes\nLOCATION: Amsterdam, Netherlands\nREASONING: The posting places the team in the Amsterdam office.',
    ]);
    const analysis = await validatorWith(client).validate('Remote - EMEA', 'Our office in Amsterdam hosts the team.');

    expect(analysis).toMatchObject({
      conflictDetected: true,
      authoritativeLocation: 'Amsterdam, Netherlands',
      confidence: 0.75,
      method: 'llm_adjudicated',
      riskLevel: 'high',
      reasoning: 'LLM analysis: The posting places the team in the Amsterdam office.',
      overrides: [],
    });
    expect(client.prompts[0]).toContain('Remote - EMEA');
    expect(client.prompts[0]).toContain('Cannot parse metadata city from "Remote - EMEA" - needs review');
  });

  it('clears a conflict the reasoning does not support', async () => {
    const client = new ScriptedEvaluationClient([
      'CONFLICT: yes\nLOCATION: Rotterdam, Netherlands\nREASONING: The posting mentions a different office.',
    ]);
    const analysis = await validatorWith(client).validate('Remote - EMEA', 'Our office in Amsterdam hosts the team.');

    expect(analysis).toMatchObject({
      conflictDetected: false,
      authoritativeLocation: 'Remote - EMEA',
      riskLevel: 'none',
      overrides: ['unsupported-claim'],
      reasoning:
        'LLM analysis: The posting mentions a different office. (Override: "Rotterdam, Netherlands" is not supported by the reasoning)',
    });
  });

  it('clears a conflict when the metadata location appears in the body', async () => {
    const client = new ScriptedEvaluationClient([
      'CONFLICT: yes\nLOCATION: Amsterdam\nREASONING: The team sits in Amsterdam.',
    ]);
    const analysis = await validatorWith(client).validate(
      'Eindhoven',
      'Our Eindhoven site works closely with colleagues in Amsterdam.'
    );

    expect(analysis.conflictDetected).toBe(false);
    expect(analysis.authoritativeLocation).toBe('Eindhoven');
    expect(analysis.overrides).toEqual(['metadata-mentioned']);
  });

  it('clears a conflict between spellings of the same place', async () => {
    const client = new ScriptedEvaluationClient([
      'CONFLICT: yes\nLOCATION: EINDHOVEN\nREASONING: The role is in Eindhoven.',
    ]);
    const analysis = await validatorWith(client).validate('Eindhoven', 'Our Eindhoven site works with Amsterdam.');

    expect(analysis.overrides).toEqual(['same-city']);
    expect(analysis.reasoning).toBe('LLM analysis: The role is in Eindhoven. (Override: locations refer to the same city)');
  });

  it('clears a conflict between country spellings', async () => {
    const client = new ScriptedEvaluationClient([
      'CONFLICT: YES\nLOCATION: Deutschland\nREASONING: The posting states Standort: Deutschland.',
    ]);
    const analysis = await validatorWith(client).validate(
      'Germany',
      'Standort: Deutschland. The team works with colleagues in Vienna.'
    );

    expect(analysis).toMatchObject({
      conflictDetected: false,
      authoritativeLocation: 'Germany',
      method: 'llm_adjudicated',
      riskLevel: 'none',
      overrides: ['same-city'],
    });
  });

  it('sends unknown places to adjudication', async () => {
    const client = new ScriptedEvaluationClient(['CONFLICT: no\nLOCATION: Munich\nREASONING: Ingolstadt is a site visit.']);
    const analysis = await validatorWith(client).validate('Munich', 'The role is based in Ingolstadt.');

    expect(client.prompts[0]).toContain('Places outside the gazetteer mentioned: Ingolstadt - needs review');
    expect(analysis).toMatchObject({
      conflictDetected: false,
      authoritativeLocation: 'Munich',
      method: 'llm_adjudicated',
      reasoning: 'LLM analysis: Ingolstadt is a site visit.',
    });
  });

  it('keeps the metadata location for an incomplete answer', async () => {
    const client = new ScriptedEvaluationClient(['I think the location is fine.']);
    const analysis = await validatorWith(client).validate('Remote - EMEA', 'Our office in Amsterdam hosts the team.');

    expect(analysis).toMatchObject({
      conflictDetected: false,
      confidence: 0.6,
      method: 'llm_adjudicated',
      reasoning: 'LLM analysis: incomplete answer - using metadata location',
    });
  });

  it('falls back to the metadata location when the LLM call fails', async () => {
    const client = new ScriptedEvaluationClient([new Error('connection refused')]);
    const analysis = await validatorWith(client).validate('Remote - EMEA', 'Our office in Amsterdam hosts the team.');

    expect(analysis).toMatchObject({
      conflictDetected: false,
      authoritativeLocation: 'Remote - EMEA',
      confidence: 0,
      method: 'error_fallback',
      riskLevel: 'none',
      reasoning: 'LLM validation failed (connection refused) - using metadata location',
    });
  });

  it('falls back without calling an unavailable LLM', async () => {
    const client = new ScriptedEvaluationClient();
    const analysis = await validatorWith(client, false).validate(
      'Remote - EMEA',
      'Our office in Amsterdam hosts the team.'
    );

    expect(analysis.method).toBe('error_fallback');
    expect(analysis.reasoning).toBe('LLM validation failed (LLM unavailable) - using metadata location');
    expect(client.prompts).toHaveLength(0);
  });

  it('rejects when cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      validatorWith(new ScriptedEvaluationClient()).validate('Berlin', 'Berlin office', { signal: controller.signal })
    ).rejects.toBeInstanceOf(EvaluationCancelledError);
  });
});

describe('HybridLocationValidator stats', () => {
  it('counts jobs, conflicts and methods', async () => {
    const validator = validatorWith(new ScriptedEvaluationClient([new Error('timeout')]));
    await validator.validate('Frankfurt', 'Our team is in Pune.');
    await validator.validate('Berlin', 'Office in Berlin.');
    await validator.validate('Remote - EMEA', 'Our office in Amsterdam hosts the team.');

    const stats = validator.stats.snapshot();
    expect(stats).toMatchObject({
      jobsProcessed: 3,
      conflictsDetected: 1,
      highRiskConflicts: 1,
      methodDistribution: { gazetteer: 2, llm_adjudicated: 0, error_fallback: 1 },
    });
    expect(stats.conflictRatePct).toBeCloseTo(33.33, 1);

    validator.stats.reset();
    expect(validator.stats.snapshot().jobsProcessed).toBe(0);
  });
});

import { describe, expect, it } from 'vitest';
import {
  GENERIC_RATIONALE,
  MatchConsensusEvaluator,
} from '../src/matching/MatchConsensusEvaluator';
import { MATCH_LEVELS, MatchResult, MatchSuccess } from '../src/matching/types';
import { ALL_AVAILABLE, LLM_UNAVAILABLE } from '../src/llm/availability';
import { EvaluationCancelledError } from '../src/errors';
import { MATCH_EVALUATION_PROMPT } from '../src/prompts/templates';
import { ScriptedEvaluationClient, declineResponse, goodResponse } from './helpers';

const CV = 'Senior backend engineer, eight years in payments.';
const JOB = 'Backend engineer for a card issuing platform.';
const NARRATIVE = 'I built card issuing platforms for a decade.';

function expectOk(result: MatchResult): MatchSuccess {
  if (result.status !== 'ok') {
    throw new Error(`expected a match result, got ${result.error}`);
  }
  return result;
}

describe('MatchConsensusEvaluator', () => {
  it('keeps the lowest level across five runs', async () => {
    const client = new ScriptedEvaluationClient([
      goodResponse(NARRATIVE),
      goodResponse(NARRATIVE),
      declineResponse('Moderate', 'The role needs hands-on Kubernetes operations.'),
      goodResponse(NARRATIVE),
      goodResponse(NARRATIVE),
    ]);
    const result = expectOk(await new MatchConsensusEvaluator(client, ALL_AVAILABLE).evaluate(CV, JOB));

    expect(result.finalMatchLevel).toBe('Moderate');
    expect(result.contentType).toBe('NoGoRationale');
    expect(result.contentText).toBe('The role needs hands-on Kubernetes operations.');
    expect(result.adjustments).toEqual([]);
    expect(result.domainGap).toBeUndefined();
    expect(result.runs.map(r => r.extractedMatchLevel)).toEqual(['Good', 'Good', 'Moderate', 'Good', 'Good']);
    expect(result.promptHash).toBe(MATCH_EVALUATION_PROMPT.hash);
  });

  it('gives the same verdict with batched runs', async () => {
    const client = new ScriptedEvaluationClient([
      goodResponse(NARRATIVE),
      goodResponse(NARRATIVE),
      declineResponse('Moderate', 'The role needs hands-on Kubernetes operations.'),
      goodResponse(NARRATIVE),
      goodResponse(NARRATIVE),
    ]);
    const evaluator = new MatchConsensusEvaluator(client, ALL_AVAILABLE, { batchSize: 5 });
    const result = expectOk(await evaluator.evaluate(CV, JOB));

    expect(result.finalMatchLevel).toBe('Moderate');
    expect(result.runs[2].extractedMatchLevel).toBe('Moderate');
  });

  it('reports ExtractionFailure when every attempt of every run fails', async () => {
    const client = new ScriptedEvaluationClient([], 'I am unable to assess this candidate.');
    const result = await new MatchConsensusEvaluator(client, ALL_AVAILABLE).evaluate(CV, JOB);

    expect(result.status).toBe('error');
    if (result.status === 'error') {
      expect(result.error).toBe('ExtractionFailure');
    }
    expect('contentText' in result).toBe(false);
    expect('finalMatchLevel' in result).toBe(false);
    expect(result.runs).toHaveLength(5);
    expect(result.runs.every(r => r.attempts === 3 && r.retryIndex === 2)).toBe(true);
    expect(client.prompts).toHaveLength(15);
  });

  it('downgrades Good to Low when the assessment mentions a gap', async () => {
    const assessment = 'There is a gap in regulatory reporting exposure.';
    const client = new ScriptedEvaluationClient([], goodResponse(NARRATIVE, assessment));
    const result = expectOk(await new MatchConsensusEvaluator(client, ALL_AVAILABLE).evaluate(CV, JOB));

    expect(result.finalMatchLevel).toBe('Low');
    expect(result.contentType).toBe('NoGoRationale');
    expect(result.contentText).toBe(
      'I have compared my CV and the role description and decided not to apply due to critical domain knowledge gaps: There is a gap in regulatory reporting exposure.'
    );
    expect(result.domainKnowledgeAssessment).toBe(assessment);
    expect(result.adjustments.map(a => a.reason)).toEqual(['critical-domain-gap']);
  });

  it('downgrades Good to Moderate on experience wording without critical signals', async () => {
    const client = new ScriptedEvaluationClient([], goodResponse(NARRATIVE, 'Solid experience with payment APIs.'));
    const result = expectOk(await new MatchConsensusEvaluator(client, ALL_AVAILABLE).evaluate(CV, JOB));

    expect(result.finalMatchLevel).toBe('Moderate');
    expect(result.contentText).toBe(
      'I have compared my CV and the role description and decided not to apply due to the following domain knowledge gaps: Solid experience with payment APIs.'
    );
    expect(result.adjustments.map(a => a.reason)).toEqual(['moderate-domain-gap']);
  });

  it.each([
    'The candidate is highly experienced in derivatives pricing.',
    'Strong skillset in payments, knowledgeable about card schemes.',
  ])('downgrades Good to Moderate on inflected signal words: %s', async assessment => {
    const client = new ScriptedEvaluationClient([], goodResponse(NARRATIVE, assessment));
    const result = expectOk(await new MatchConsensusEvaluator(client, ALL_AVAILABLE, { runs: 1 }).evaluate(CV, JOB));

    expect(result.finalMatchLevel).toBe('Moderate');
    expect(result.adjustments.map(a => a.reason)).toEqual(['moderate-domain-gap']);
  });

  it('downgrades Good to Low when gap appears inside a word', async () => {
    const assessment = 'Employment history shows gapped periods in the sector.';
    const client = new ScriptedEvaluationClient([], goodResponse(NARRATIVE, assessment));
    const result = expectOk(await new MatchConsensusEvaluator(client, ALL_AVAILABLE, { runs: 1 }).evaluate(CV, JOB));

    expect(result.finalMatchLevel).toBe('Low');
    expect(result.adjustments.map(a => a.reason)).toEqual(['critical-domain-gap']);
  });

  it.each([
    [
      'severity',
      [
        'Strong fintech background.',
        'Strong fintech background with payments experience.',
        'Strong fintech background but missing industry experience.',
        'Strong fintech background but missing industry experience and missing domain knowledge.',
      ],
      ['Good', 'Moderate', 'Low', 'Low'],
    ],
    [
      'density',
      [
        'Strong fintech background.',
        'Strong fintech background across many teams, some asset management.',
        'Asset management, market trends.',
      ],
      ['Good', 'Moderate', 'Low'],
    ],
  ])('never raises the level as %s grows', async (_axis, assessments, expected) => {
    const levels: string[] = [];
    for (const assessment of assessments) {
      const client = new ScriptedEvaluationClient([], goodResponse(NARRATIVE, assessment));
      const result = expectOk(await new MatchConsensusEvaluator(client, ALL_AVAILABLE, { runs: 1 }).evaluate(CV, JOB));
      levels.push(result.finalMatchLevel);
    }

    expect(levels).toEqual(expected);
    const ranks = levels.map(level => MATCH_LEVELS.findIndex(l => l === level));
    ranks.slice(1).forEach((rank, i) => expect(rank).toBeLessThanOrEqual(ranks[i]));
  });

  it('keeps a clean Good verdict with its narrative', async () => {
    const client = new ScriptedEvaluationClient([], goodResponse(NARRATIVE, 'Strong fintech background.'));
    const result = expectOk(await new MatchConsensusEvaluator(client, ALL_AVAILABLE).evaluate(CV, JOB));

    expect(result.finalMatchLevel).toBe('Good');
    expect(result.contentType).toBe('ApplicationNarrative');
    expect(result.contentText).toBe(NARRATIVE);
    expect(result.domainGap?.severity).toBe(0);
    expect(result.adjustments).toEqual([]);
  });

  it('records the forced Low adjustment', async () => {
    const client = new ScriptedEvaluationClient([
      goodResponse(NARRATIVE),
      declineResponse('Low', 'The role requires a medical licence I do not hold.'),
      goodResponse(NARRATIVE),
    ]);
    const result = expectOk(await new MatchConsensusEvaluator(client, ALL_AVAILABLE, { runs: 3 }).evaluate(CV, JOB));

    expect(result.finalMatchLevel).toBe('Low');
    expect(result.contentText).toBe('The role requires a medical licence I do not hold.');
    expect(result.adjustments).toEqual([
      { reason: 'forced-low', from: 'Good', to: 'Low', detail: 'Levels across runs: Good, Low, Good' },
    ]);
  });

  it('downgrades a Good match that carries a rationale', async () => {
    const client = new ScriptedEvaluationClient(
      [],
      'CV-to-role match: Good match\nNo-go rationale: The role needs a banking licence.'
    );
    const result = expectOk(await new MatchConsensusEvaluator(client, ALL_AVAILABLE, { runs: 1 }).evaluate(CV, JOB));

    expect(result.finalMatchLevel).toBe('Moderate');
    expect(result.contentType).toBe('NoGoRationale');
    expect(result.contentText).toBe('The role needs a banking licence.');
    expect(result.contentMismatch).toBe(true);
    expect(result.adjustments.map(a => a.reason)).toEqual(['content-mismatch']);
  });

  it('replaces short content with the generic rationale', async () => {
    const client = new ScriptedEvaluationClient([], declineResponse('Low', 'Too far.'));
    const result = expectOk(await new MatchConsensusEvaluator(client, ALL_AVAILABLE, { runs: 1 }).evaluate(CV, JOB));

    expect(result.contentText).toBe(GENERIC_RATIONALE);
    expect(result.adjustments).toEqual([
      { reason: 'short-content-fallback', from: 'Low', to: 'Low', detail: 'Content shorter than 15 characters' },
    ]);
  });

  it('retries a run with a fresh nonce until a level is found', async () => {
    const client = new ScriptedEvaluationClient(['No verdict here.', goodResponse(NARRATIVE)]);
    const result = expectOk(await new MatchConsensusEvaluator(client, ALL_AVAILABLE, { runs: 1 }).evaluate(CV, JOB));

    expect(result.runs[0]).toMatchObject({ runIndex: 0, attempts: 2, retryIndex: 1, extractedMatchLevel: 'Good' });
    expect(client.prompts[0]).toContain('run-1-attempt-1-');
    expect(client.prompts[1]).toContain('run-1-attempt-2-');
    expect(client.prompts[0]).not.toBe(client.prompts[1]);
  });

  it('turns client errors into failed runs', async () => {
    const client = new ScriptedEvaluationClient([], new Error('connection refused'));
    const result = await new MatchConsensusEvaluator(client, ALL_AVAILABLE, { runs: 2 }).evaluate(CV, JOB);

    expect(result.status).toBe('error');
    expect(result.runs.map(r => r.error)).toEqual(['connection refused', 'connection refused']);
  });

  it('skips the client when the LLM is unavailable', async () => {
    const client = new ScriptedEvaluationClient([], goodResponse(NARRATIVE));
    const result = await new MatchConsensusEvaluator(client, LLM_UNAVAILABLE, { runs: 2 }).evaluate(CV, JOB);

    expect(result.status).toBe('error');
    expect(result.runs.map(r => [r.attempts, r.error])).toEqual([
      [0, 'LLM unavailable'],
      [0, 'LLM unavailable'],
    ]);
    expect(client.prompts).toHaveLength(0);
  });

  it('rejects when cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const evaluator = new MatchConsensusEvaluator(new ScriptedEvaluationClient([], goodResponse(NARRATIVE)), ALL_AVAILABLE);

    await expect(evaluator.evaluate(CV, JOB, { signal: controller.signal })).rejects.toBeInstanceOf(
      EvaluationCancelledError
    );
  });

  it('propagates cancellation raised by the client', async () => {
    const client = new ScriptedEvaluationClient([], new EvaluationCancelledError());
    const evaluator = new MatchConsensusEvaluator(client, ALL_AVAILABLE);

    await expect(evaluator.evaluate(CV, JOB)).rejects.toBeInstanceOf(EvaluationCancelledError);
    expect(client.prompts).toHaveLength(1);
  });

  it('rejects non-positive run counts', () => {
    expect(() => new MatchConsensusEvaluator(new ScriptedEvaluationClient(), ALL_AVAILABLE, { runs: 0 })).toThrow(
      RangeError
    );
  });
});

import { describe, it, expect } from 'vitest';
import { collectCheckOutcomes, runChecks } from '../../src/runner/check-runner.js';
import { CheckExecutionError } from '../../src/errors/index.js';
import { FakeCursor, check } from '../helpers/fake-cursor.js';

describe('runChecks', () => {
  it('keeps checks with rows and drops empty ones', async () => {
    const cursor = new FakeCursor({
      orphaned_triggers: [['HR', 'TRG_A'], ['HR', 'TRG_B']],
      dangling_links: [],
    });

    const report = await runChecks(
      cursor,
      [check('orphaned_triggers'), check('dangling_links')],
      ['SYS', 'SYSTEM']
    );

    expect(report).toHaveLength(1);
    expect(report[0]).toEqual({
      name: 'orphaned_triggers',
      description: 'orphaned_triggers description',
      warning: 'orphaned_triggers warning',
      rows: [['HR', 'TRG_A'], ['HR', 'TRG_B']],
    });
  });

  it('executes checks in definition order with the exclusion list substituted', async () => {
    const cursor = new FakeCursor();

    await runChecks(cursor, [check('first_check'), check('second_check')], ['SYS', 'SYSTEM']);

    expect(cursor.executed).toEqual([
      "SELECT * FROM first_check WHERE OWNER NOT IN ('SYS', 'SYSTEM')",
      "SELECT * FROM second_check WHERE OWNER NOT IN ('SYS', 'SYSTEM')",
    ]);
  });

  it('preserves definition order in the report', async () => {
    const cursor = new FakeCursor({
      zeta_check: [['Z']],
      alpha_check: [['A']],
    });

    const report = await runChecks(cursor, [check('zeta_check'), check('alpha_check')], []);

    expect(report.map(result => result.name)).toEqual(['zeta_check', 'alpha_check']);
  });

  it('defaults a missing description and warning to empty strings', async () => {
    const cursor = new FakeCursor({ bare_check: [[1]] });

    const report = await runChecks(
      cursor,
      [{ name: 'bare_check', query: 'SELECT 1 FROM bare_check' }],
      []
    );

    expect(report[0]?.description).toBe('');
    expect(report[0]?.warning).toBe('');
  });

  it('returns an empty report when no checks are defined', async () => {
    const cursor = new FakeCursor();

    const report = await runChecks(cursor, [], ['SYS']);

    expect(report).toEqual([]);
    expect(cursor.executed).toEqual([]);
  });

  it('aborts on the first failing check without running the rest', async () => {
    const cursor = new FakeCursor({
      broken_check: new Error('ORA-00942: table or view does not exist'),
    });

    const run = runChecks(
      cursor,
      [check('ok_check'), check('broken_check'), check('later_check')],
      []
    );

    await expect(run).rejects.toBeInstanceOf(CheckExecutionError);
    await expect(run).rejects.toThrow(
      'Check "broken_check" failed: ORA-00942: table or view does not exist'
    );
    expect(cursor.executed).toHaveLength(2);
  });

  it('returns frozen results', async () => {
    const cursor = new FakeCursor({ frozen_check: [['X']] });

    const report = await runChecks(cursor, [check('frozen_check')], []);

    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report[0])).toBe(true);
    expect(Object.isFrozen(report[0]?.rows)).toBe(true);
  });
});

describe('collectCheckOutcomes', () => {
  it('records one outcome per check and continues past failures', async () => {
    const failure = new Error('ORA-01031: insufficient privileges');
    const cursor = new FakeCursor({
      with_rows: [['HR', 'EMP']],
      failing_one: failure,
    });

    const outcomes = await collectCheckOutcomes(
      cursor,
      [check('with_rows'), check('failing_one'), check('no_rows')],
      []
    );

    expect(outcomes.map(outcome => [outcome.name, outcome.status])).toEqual([
      ['with_rows', 'findings'],
      ['failing_one', 'failed'],
      ['no_rows', 'empty'],
    ]);
    expect(cursor.executed).toHaveLength(3);

    const failed = outcomes[1];
    expect(failed?.status).toBe('failed');
    if (failed?.status === 'failed') {
      expect(failed.error).toBeInstanceOf(CheckExecutionError);
      expect(failed.error.cause).toBe(failure);
    }
  });
});

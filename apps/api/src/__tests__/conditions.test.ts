import { describe, it, expect } from '@jest/globals';
import { ConditionEvaluationError } from '@fleet-alerts/domain';
import type { Rule, StoredRuleConditions } from '@fleet-alerts/domain';
import { autoCloseClause, escalationClause, expiryClause } from '../services/rules/conditions.js';

function rule(conditions: StoredRuleConditions): Rule {
  return {
    ruleId: 'R-TEST',
    sourceType: 'OVERSPEEDING',
    name: 'test rule',
    conditions,
    isActive: true,
    priority: 1,
    createdAt: new Date(0),
  };
}

describe('escalationClause', () => {
  it('returns null when the rule has no count threshold', () => {
    expect(escalationClause(rule({ expireAfterMins: 10 }))).toBeNull();
    expect(escalationClause(rule({ windowMins: 10 }))).toBeNull();
  });

  it('returns the threshold and window', () => {
    expect(escalationClause(rule({ escalateIfCount: 3, windowMins: 60 }))).toEqual({
      escalateIfCount: 3,
      windowMins: 60,
    });
  });

  it('requires a window alongside the threshold', () => {
    expect(() => escalationClause(rule({ escalateIfCount: 3 }))).toThrow('rule R-TEST: windowMins required');
  });

  it('rejects non-positive and fractional thresholds', () => {
    expect(() => escalationClause(rule({ escalateIfCount: 0, windowMins: 60 }))).toThrow(ConditionEvaluationError);
    expect(() => escalationClause(rule({ escalateIfCount: 2.5, windowMins: 60 }))).toThrow(ConditionEvaluationError);
    expect(() => escalationClause(rule({ escalateIfCount: 2, windowMins: -1 }))).toThrow(ConditionEvaluationError);
  });

  it('rejects values stored with the wrong type', () => {
    expect(() => escalationClause(rule({ escalateIfCount: 3, windowMins: '60' }))).toThrow(
      'rule R-TEST: windowMins expected number, received string',
    );
    expect(() => escalationClause(rule({ escalateIfCount: '3', windowMins: 60 }))).toThrow(ConditionEvaluationError);
  });
});

describe('autoCloseClause', () => {
  it('returns the field name', () => {
    expect(autoCloseClause(rule({ autoCloseIf: 'document_valid' }))).toBe('document_valid');
    expect(autoCloseClause(rule({}))).toBeNull();
  });

  it('rejects a blank field name', () => {
    expect(() => autoCloseClause(rule({ autoCloseIf: '  ' }))).toThrow(ConditionEvaluationError);
  });

  it('rejects a field name that is not a string', () => {
    expect(() => autoCloseClause(rule({ autoCloseIf: 5 }))).toThrow(
      'rule R-TEST: autoCloseIf expected string, received number',
    );
  });
});

describe('expiryClause', () => {
  it('returns the minutes', () => {
    expect(expiryClause(rule({ expireAfterMins: 1440 }))).toBe(1440);
    expect(expiryClause(rule({ autoCloseIf: 'x' }))).toBeNull();
  });

  it('rejects non-positive minutes', () => {
    expect(() => expiryClause(rule({ expireAfterMins: 0 }))).toThrow(ConditionEvaluationError);
  });
});

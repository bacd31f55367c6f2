import { z } from 'zod';
import { ConflictError, NotFoundError, SOURCE_TYPES } from '@fleet-alerts/domain';
import type {
  NewRule,
  Rule,
  RuleListFilters,
  RuleRepositoryPort,
  RuleUpdate,
  SourceType,
  StoredRuleConditions,
} from '@fleet-alerts/domain';
import { getPool, translateDbErrors } from './pool.js';

const UNIQUE_VIOLATION = '23505';

// Clause values are checked where they are evaluated, so a mistyped clause only sidelines its own rule.
const conditionsSchema = z.object({
  escalateIfCount: z.unknown(),
  windowMins: z.unknown(),
  autoCloseIf: z.unknown(),
  expireAfterMins: z.unknown(),
});

const ruleRowSchema = z.object({
  rule_id: z.string(),
  source_type: z.enum(SOURCE_TYPES),
  name: z.string(),
  description: z.string().nullable(),
  conditions: conditionsSchema,
  is_active: z.boolean(),
  priority: z.number().int(),
  created_at: z.date(),
  updated_at: z.date().nullable(),
});

export class PgRuleStore implements RuleRepositoryPort {
  async activeRulesFor(sourceType: SourceType): Promise<Rule[]> {
    return this.list({ sourceType, isActive: true });
  }

  async list(filters: RuleListFilters = {}): Promise<Rule[]> {
    return translateDbErrors('rules.list', async () => {
      const conditions: string[] = [];
      const params: unknown[] = [];
      let idx = 1;

      if (filters.sourceType) {
        conditions.push(`source_type = $${idx++}`);
        params.push(filters.sourceType);
      }
      if (filters.isActive !== undefined) {
        conditions.push(`is_active = $${idx++}`);
        params.push(filters.isActive);
      }

      const where = conditions.length ? `WHERE ${conditions.join(' AND ')}` : '';
      const { rows } = await getPool().query(
        `SELECT * FROM alerting.rules ${where} ORDER BY priority ASC, rule_id ASC`,
        params,
      );
      return rows.map(mapRuleRow);
    });
  }

  async findById(ruleId: string): Promise<Rule | null> {
    return translateDbErrors('rules.findById', async () => {
      const { rows } = await getPool().query(`SELECT * FROM alerting.rules WHERE rule_id = $1`, [ruleId]);
      return rows[0] ? mapRuleRow(rows[0]) : null;
    });
  }

  async create(rule: NewRule): Promise<Rule> {
    return translateDbErrors('rules.create', async () => {
      try {
        const { rows } = await getPool().query(
          `INSERT INTO alerting.rules
             (rule_id, source_type, name, description, conditions, is_active, priority)
           VALUES ($1, $2, $3, $4, $5::jsonb, $6, $7)
           RETURNING *`,
          ruleParams(rule),
        );
        return mapRuleRow(rows[0]);
      } catch (err) {
        if (isUniqueViolation(err)) throw new ConflictError(`rule ${rule.ruleId} already exists`);
        throw err;
      }
    });
  }

  async update(ruleId: string, update: RuleUpdate): Promise<Rule> {
    return translateDbErrors('rules.update', async () => {
      const sets: string[] = [];
      const params: unknown[] = [ruleId];
      let idx = 2;

      if (update.sourceType !== undefined) {
        sets.push(`source_type = $${idx++}`);
        params.push(update.sourceType);
      }
      if (update.name !== undefined) {
        sets.push(`name = $${idx++}`);
        params.push(update.name);
      }
      if (update.description !== undefined) {
        sets.push(`description = $${idx++}`);
        params.push(update.description);
      }
      if (update.conditions !== undefined) {
        sets.push(`conditions = $${idx++}::jsonb`);
        params.push(JSON.stringify(update.conditions));
      }
      if (update.isActive !== undefined) {
        sets.push(`is_active = $${idx++}`);
        params.push(update.isActive);
      }
      if (update.priority !== undefined) {
        sets.push(`priority = $${idx++}`);
        params.push(update.priority);
      }
      sets.push('updated_at = NOW()');

      const { rows } = await getPool().query(
        `UPDATE alerting.rules SET ${sets.join(', ')} WHERE rule_id = $1 RETURNING *`,
        params,
      );
      if (!rows[0]) throw new NotFoundError('rule', ruleId);
      return mapRuleRow(rows[0]);
    });
  }

  async delete(ruleId: string): Promise<void> {
    return translateDbErrors('rules.delete', async () => {
      const { rowCount } = await getPool().query(`DELETE FROM alerting.rules WHERE rule_id = $1`, [ruleId]);
      if (!rowCount) throw new NotFoundError('rule', ruleId);
    });
  }

  async insertIfAbsent(rule: NewRule): Promise<boolean> {
    return translateDbErrors('rules.insertIfAbsent', async () => {
      const { rowCount } = await getPool().query(
        `INSERT INTO alerting.rules
           (rule_id, source_type, name, description, conditions, is_active, priority)
         VALUES ($1, $2, $3, $4, $5::jsonb, $6, $7)
         ON CONFLICT (rule_id) DO NOTHING`,
        ruleParams(rule),
      );
      return rowCount === 1;
    });
  }
}

function ruleParams(rule: NewRule): unknown[] {
  return [
    rule.ruleId,
    rule.sourceType,
    rule.name,
    rule.description ?? null,
    JSON.stringify(rule.conditions),
    rule.isActive,
    rule.priority,
  ];
}

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === UNIQUE_VIOLATION;
}

export function mapRuleRow(raw: unknown): Rule {
  const row = ruleRowSchema.parse(raw);
  const conditions: StoredRuleConditions = {
    escalateIfCount: row.conditions.escalateIfCount ?? undefined,
    windowMins: row.conditions.windowMins ?? undefined,
    autoCloseIf: row.conditions.autoCloseIf ?? undefined,
    expireAfterMins: row.conditions.expireAfterMins ?? undefined,
  };
  return {
    ruleId: row.rule_id,
    sourceType: row.source_type,
    name: row.name,
    description: row.description ?? undefined,
    conditions,
    isActive: row.is_active,
    priority: row.priority,
    createdAt: row.created_at,
    updatedAt: row.updated_at ?? undefined,
  };
}

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createTalentOperations, OperationInputError } from '../../src/application/index.js';
import type { OperationDefinition } from '../../src/application/index.js';
import type { UpstreamClient } from '../../src/infrastructure/upstream/index.js';

const get = vi.fn();
const upstream: UpstreamClient = { get };
const operations = createTalentOperations(upstream);

function op(name: string): OperationDefinition {
  const found = operations.find((o) => o.name === name);
  if (found === undefined) throw new Error(`missing operation ${name}`);
  return found;
}

beforeEach(() => {
  get.mockReset();
  get.mockResolvedValue('{"ok":true}');
});

// ─── catalog ─────────────────────────────────────────────────

describe('catalog', () => {
  it('exposes the thirteen talent operations, all audited', () => {
    expect(operations.map((o) => o.name)).toEqual([
      'get_employee_skills',
      'get_skill_evidence',
      'get_top_skills',
      'get_evidence_inventory',
      'browse_skills',
      'get_top_experts',
      'get_skill_coverage',
      'get_evidence_backed_candidates',
      'get_stale_skills',
      'get_cooccurring_skills',
      'search_talent',
      'get_org_skill_summary',
      'get_org_skill_experts',
    ]);
    expect(operations.every((o) => o.audited)).toBe(true);
  });
});

// ─── forwarding ──────────────────────────────────────────────

describe('forwarding', () => {
  it('returns the upstream body untouched', async () => {
    expect(await op('get_employee_skills').run({ employee_id: 'EMP000001' })).toBe('{"ok":true}');
    expect(get).toHaveBeenCalledWith('/tm/employees/EMP000001/skills');
  });

  it('encodes path segments', async () => {
    await op('get_evidence_inventory').run({ employee_id: 'EMP/1' });

    expect(get).toHaveBeenCalledWith('/tm/employees/EMP%2F1/evidence');
  });

  it('truncates float ids and limits', async () => {
    await op('get_skill_evidence').run({ employee_id: 'EMP000001', skill_id: 7.0 });
    await op('get_top_experts').run({ skill_id: 3.9, limit: 15.6 });

    expect(get).toHaveBeenNthCalledWith(1, '/tm/employees/EMP000001/skills/7/evidence');
    expect(get).toHaveBeenNthCalledWith(2, '/tm/skills/3/experts', { min_proficiency: 4, limit: 15 });
  });

  it('applies parameter defaults', async () => {
    await op('get_top_skills').run({ employee_id: 'EMP000001' });
    await op('get_evidence_backed_candidates').run({ skill_id: 12 });
    await op('get_stale_skills').run({ skill_id: 12 });
    await op('get_cooccurring_skills').run({ skill_id: 12 });
    await op('get_org_skill_experts').run({ org_unit_id: 'ORG030', skill_id: 12 });

    expect(get.mock.calls).toEqual([
      ['/tm/employees/EMP000001/top-skills', { limit: 10 }],
      ['/tm/skills/12/candidates', { min_proficiency: 3, min_evidence_strength: 4, limit: 20 }],
      ['/tm/skills/12/stale', { older_than_days: 365 }],
      ['/tm/skills/12/cooccurring', { min_proficiency: 3, top: 20 }],
      ['/tm/orgs/ORG030/skills/12/experts', { min_proficiency: 3, limit: 20 }],
    ]);
  });

  it('leaves optional catalog filters unset', async () => {
    await op('browse_skills').run({});
    await op('browse_skills').run({ category: 'Cloud', search: 'kube' });

    expect(get).toHaveBeenNthCalledWith(1, '/tm/skills', { category: undefined, search: undefined });
    expect(get).toHaveBeenNthCalledWith(2, '/tm/skills', { category: 'Cloud', search: 'kube' });
  });

  it('forwards talent search and org summary', async () => {
    await op('search_talent').run({ skills: 'TypeScript,SQL' });
    await op('get_org_skill_summary').run({ org_unit_id: 'ORG030', limit: 5 });

    expect(get).toHaveBeenNthCalledWith(1, '/tm/talent/search', { skills: 'TypeScript,SQL', min_proficiency: 3 });
    expect(get).toHaveBeenNthCalledWith(2, '/tm/orgs/ORG030/skills/summary', { limit: 5 });
  });
});

// ─── validation ──────────────────────────────────────────────

describe('validation', () => {
  it('rejects a missing required argument without calling upstream', async () => {
    await expect(op('get_top_experts').run({})).rejects.toBeInstanceOf(OperationInputError);
    expect(get).not.toHaveBeenCalled();
  });

  it('rejects a blank employee id', async () => {
    await expect(op('get_employee_skills').run({ employee_id: '  ' })).rejects.toBeInstanceOf(
      OperationInputError,
    );
  });

  it('rejects a non-numeric skill id', async () => {
    const err = await op('get_skill_coverage').run({ skill_id: 'abc' }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(OperationInputError);
    expect(err instanceof OperationInputError ? err.issues.map((i) => i.path) : []).toEqual([['skill_id']]);
  });
});

import { z } from 'zod';
import type { UpstreamClient } from '../infrastructure/upstream/index.js';
import { defineOperation } from './operation.js';
import type { OperationDefinition } from './operation.js';

/**
 * Integer-valued parameter that also accepts floats (`1.0`, `4.7`),
 * truncated toward zero. Some clients only send JSON numbers as floats.
 */
function whole(description: string) {
  return z.number().finite().describe(description).transform((n) => Math.trunc(n));
}

const employeeId = z.string().trim().min(1).describe('Employee ID, e.g. EMP000001');
const orgUnitId = z.string().trim().min(1).describe('Org unit ID, e.g. ORG030');
const skillId = whole('Numeric skill ID');

function segment(value: string | number): string {
  return encodeURIComponent(String(value));
}

/**
 * Read-only operations forwarded to the upstream talent API.
 * Each one is a single GET; the response body is returned untouched.
 */
export function createTalentOperations(upstream: UpstreamClient): OperationDefinition[] {
  return [
    // --- Employee-centric ---
    defineOperation({
      name: 'get_employee_skills',
      description: 'Full skill profile for an employee: proficiency, confidence, source, last update.',
      params: z.object({ employee_id: employeeId }),
      handler: (a) => upstream.get(`/tm/employees/${segment(a.employee_id)}/skills`),
    }),
    defineOperation({
      name: 'get_skill_evidence',
      description: "Evidence behind an employee's rating for one skill.",
      params: z.object({ employee_id: employeeId, skill_id: skillId }),
      handler: (a) =>
        upstream.get(`/tm/employees/${segment(a.employee_id)}/skills/${segment(a.skill_id)}/evidence`),
    }),
    defineOperation({
      name: 'get_top_skills',
      description: "An employee's strongest skills ranked by proficiency and confidence.",
      params: z.object({ employee_id: employeeId, limit: whole('1-50').default(10) }),
      handler: (a) =>
        upstream.get(`/tm/employees/${segment(a.employee_id)}/top-skills`, { limit: a.limit }),
    }),
    defineOperation({
      name: 'get_evidence_inventory',
      description: 'All evidence items across all skills for an employee.',
      params: z.object({ employee_id: employeeId }),
      handler: (a) => upstream.get(`/tm/employees/${segment(a.employee_id)}/evidence`),
    }),

    // --- Skill-centric ---
    defineOperation({
      name: 'browse_skills',
      description: 'Skill catalog, optionally filtered by category or search term.',
      params: z.object({
        category: z.string().trim().min(1).optional(),
        search: z.string().trim().min(1).max(200).optional(),
      }),
      handler: (a) => upstream.get('/tm/skills', { category: a.category, search: a.search }),
    }),
    defineOperation({
      name: 'get_top_experts',
      description: 'Top experts for a skill by proficiency, confidence and recency.',
      params: z.object({
        skill_id: skillId,
        min_proficiency: whole('0-5').default(4),
        limit: whole('1-100').default(20),
      }),
      handler: (a) =>
        upstream.get(`/tm/skills/${segment(a.skill_id)}/experts`, {
          min_proficiency: a.min_proficiency,
          limit: a.limit,
        }),
    }),
    defineOperation({
      name: 'get_skill_coverage',
      description: 'Proficiency distribution for a skill and the count above a threshold.',
      params: z.object({ skill_id: skillId, min_proficiency: whole('0-5').default(3) }),
      handler: (a) =>
        upstream.get(`/tm/skills/${segment(a.skill_id)}/coverage`, {
          min_proficiency: a.min_proficiency,
        }),
    }),
    defineOperation({
      name: 'get_evidence_backed_candidates',
      description: 'Employees with a skill and strong evidence backing it.',
      params: z.object({
        skill_id: skillId,
        min_proficiency: whole('0-5').default(3),
        min_evidence_strength: whole('1-5').default(4),
        limit: whole('1-100').default(20),
      }),
      handler: (a) =>
        upstream.get(`/tm/skills/${segment(a.skill_id)}/candidates`, {
          min_proficiency: a.min_proficiency,
          min_evidence_strength: a.min_evidence_strength,
          limit: a.limit,
        }),
    }),
    defineOperation({
      name: 'get_stale_skills',
      description: 'Employees whose record for a skill has not been updated recently.',
      params: z.object({ skill_id: skillId, older_than_days: whole('Days').default(365) }),
      handler: (a) =>
        upstream.get(`/tm/skills/${segment(a.skill_id)}/stale`, {
          older_than_days: a.older_than_days,
        }),
    }),
    defineOperation({
      name: 'get_cooccurring_skills',
      description: 'Skills that commonly co-occur with a given skill.',
      params: z.object({
        skill_id: skillId,
        min_proficiency: whole('0-5').default(3),
        top: whole('1-50').default(20),
      }),
      handler: (a) =>
        upstream.get(`/tm/skills/${segment(a.skill_id)}/cooccurring`, {
          min_proficiency: a.min_proficiency,
          top: a.top,
        }),
    }),

    // --- Talent search ---
    defineOperation({
      name: 'search_talent',
      description: 'Employees holding ALL listed skills (comma-separated names) at a minimum proficiency.',
      params: z.object({
        skills: z.string().trim().min(1),
        min_proficiency: whole('0-5').default(3),
      }),
      handler: (a) =>
        upstream.get('/tm/talent/search', {
          skills: a.skills,
          min_proficiency: a.min_proficiency,
        }),
    }),

    // --- Org-centric ---
    defineOperation({
      name: 'get_org_skill_summary',
      description: 'Top skills in an org unit, including child orgs.',
      params: z.object({ org_unit_id: orgUnitId, limit: whole('1-100').default(20) }),
      handler: (a) =>
        upstream.get(`/tm/orgs/${segment(a.org_unit_id)}/skills/summary`, { limit: a.limit }),
    }),
    defineOperation({
      name: 'get_org_skill_experts',
      description: 'Employees in an org unit (and its children) who have a given skill.',
      params: z.object({
        org_unit_id: orgUnitId,
        skill_id: skillId,
        min_proficiency: whole('0-5').default(3),
        limit: whole('1-100').default(20),
      }),
      handler: (a) =>
        upstream.get(`/tm/orgs/${segment(a.org_unit_id)}/skills/${segment(a.skill_id)}/experts`, {
          min_proficiency: a.min_proficiency,
          limit: a.limit,
        }),
    }),
  ];
}

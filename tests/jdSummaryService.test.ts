import { describe, expect, it } from 'vitest';
import {
  fallbackRequirements,
  normalizeRequirements,
  parseJdSummary,
  summarizeJdReply,
} from '../services/jdSummaryService';

describe('parseJdSummary', () => {
  it('parses a well-formed JSON object', () => {
    const reply = '{"company_name":"Acme","role_title":"Engineer","requirements":["Python","SQL"]}';
    expect(parseJdSummary(reply)).toEqual({
      company_name: 'Acme',
      role_title: 'Engineer',
      requirements: ['Python', 'SQL'],
    });
  });

  it('strips surrounding code fences', () => {
    expect(parseJdSummary('```json\n{"company_name": "Acme"}\n```')).toEqual({ company_name: 'Acme' });
  });

  it('recovers an object embedded in prose', () => {
    const reply = 'Here is the summary:\n{"role_title": "Engineer"}\nLet me know if you need more.';
    expect(parseJdSummary(reply)).toEqual({ role_title: 'Engineer' });
  });

  it('returns null for replies without a JSON object', () => {
    expect(parseJdSummary('')).toBeNull();
    expect(parseJdSummary('No JSON here, sorry.')).toBeNull();
    expect(parseJdSummary('["Python", "SQL"]')).toBeNull();
    expect(parseJdSummary('{"company_name": "Acme",')).toBeNull();
  });
});

describe('fallbackRequirements', () => {
  it('drops structural lines, quotes and key labels', () => {
    const reply = [
      '{',
      '  "company_name": "Acme",',
      '  "role_title": "Engineer",',
      '  "requirements": [',
      '    "Python",',
      '    "SQL"',
      '  ]',
    ].join('\n');

    expect(fallbackRequirements(reply)).toEqual(['Acme', 'Engineer', 'Python', 'SQL']);
  });

  it('caps the list at ten entries', () => {
    const reply = Array.from({ length: 15 }, (_, index) => `req ${index + 1}`).join('\n');
    const requirements = fallbackRequirements(reply);

    expect(requirements).toHaveLength(10);
    expect(requirements[0]).toBe('req 1');
    expect(requirements[9]).toBe('req 10');
  });

  it('never returns bare structural characters', () => {
    expect(fallbackRequirements('[\n]\n{\n}\n],\n},')).toEqual([]);
  });
});

describe('normalizeRequirements', () => {
  it('accepts newline-separated strings and strips bullet glyphs', () => {
    expect(normalizeRequirements('- Python\n\n• SQL\n● Docker')).toEqual(['Python', 'SQL', 'Docker']);
  });

  it('ignores values that are neither lists nor strings', () => {
    expect(normalizeRequirements(42)).toEqual([]);
    expect(normalizeRequirements(null)).toEqual([]);
    expect(normalizeRequirements(['  ', 'Go', 7])).toEqual(['Go']);
  });
});

describe('summarizeJdReply', () => {
  it('builds a structured summary from JSON', () => {
    const reply = '{"company_name":"  ","role_title":"Data Engineer","requirements":"- Airflow\\n- dbt"}';
    expect(summarizeJdReply(reply)).toEqual({
      kind: 'structured',
      companyName: null,
      roleTitle: 'Data Engineer',
      requirements: ['Airflow', 'dbt'],
    });
  });

  it('falls back to line extraction when the reply is not JSON', () => {
    expect(summarizeJdReply('Company: Acme\nRole: Engineer')).toEqual({
      kind: 'fallback',
      requirements: ['Company: Acme', 'Role: Engineer'],
    });
  });
});

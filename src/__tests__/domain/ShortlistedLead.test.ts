/**
 * Verdict and Shortlisted Lead Tests
 */

import { describe, it, expect } from '@jest/globals';
import { createVerdict, formatExplanation } from '../../domain/entities/QualificationVerdict.js';
import { buildShortlistedLead } from '../../domain/entities/ShortlistedLead.js';

const passing = createVerdict({
  experience: { passed: true, reason: '5.00 years total experience (>= 4 required)' },
  compensation: { passed: true, reason: '$90/hr (<= $100/hr) and 25 hrs/wk (>= 20 hrs/wk)' },
  location: { passed: true, reason: 'Seattle (approved region, matched "seattle")' },
});

describe('createVerdict', () => {
  it('should qualify only when every criterion passed', () => {
    expect(passing.qualifies).toBe(true);
    expect(
      createVerdict({ ...passing.criteria, location: { passed: false, reason: 'Paris (not in approved regions)' } })
        .qualifies
    ).toBe(false);
  });
});

describe('buildShortlistedLead', () => {
  const createdAt = new Date('2025-01-01T00:00:00Z');

  it('should store the explanation as the score reason', () => {
    const lead = buildShortlistedLead('app-1', { personal: { name: 'Ada' } }, passing, createdAt);

    expect(lead).toEqual({
      applicantId: 'app-1',
      profileJson: '{"personal":{"name":"Ada"}}',
      scoreReason: formatExplanation(passing),
      createdAt,
    });
    expect(lead.scoreReason.split('\n')).toEqual([
      'Experience: 5.00 years total experience (>= 4 required)',
      'Compensation: $90/hr (<= $100/hr) and 25 hrs/wk (>= 20 hrs/wk)',
      'Location: Seattle (approved region, matched "seattle")',
    ]);
  });

  it('should keep a submitted JSON string as is', () => {
    const lead = buildShortlistedLead('app-1', '{ "personal": {} }', passing, createdAt);

    expect(lead.profileJson).toBe('{ "personal": {} }');
  });

  it('should refuse an applicant that does not qualify', () => {
    const failing = createVerdict({
      ...passing.criteria,
      compensation: { passed: false, reason: 'rate $120/hr exceeds $100/hr ceiling' },
    });

    expect(() => buildShortlistedLead('app-2', {}, failing)).toThrow('Applicant app-2 does not qualify for the shortlist');
  });
});

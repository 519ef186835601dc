import { describe, expect, it } from 'vitest';

import { formatFailureReport, serializeFailedCommits, shortId, subjectLine, truncateSubject } from '../report.js';

describe('subjectLine', () => {
  it('should return the first line of a multi-line message', () => {
    expect(subjectLine('feat: add parser\n\nLonger body text\n\nRefs: #12')).toBe('feat: add parser');
  });

  it('should trim whitespace and carriage returns', () => {
    expect(subjectLine('  fix: trailing space  \r\nbody')).toBe('fix: trailing space');
  });

  it('should return an empty string for an empty message', () => {
    expect(subjectLine('')).toBe('');
  });
});

describe('shortId', () => {
  it('should keep the first seven characters', () => {
    expect(shortId('abc1234567890')).toBe('abc1234');
  });

  it('should leave short ids untouched', () => {
    expect(shortId('c')).toBe('c');
  });
});

describe('truncateSubject', () => {
  it('should keep subjects up to the limit', () => {
    const subject = 'a'.repeat(72);

    expect(truncateSubject(subject)).toBe(subject);
  });

  it('should cut long subjects and end them with an ellipsis', () => {
    const truncated = truncateSubject('a'.repeat(80));

    expect(truncated).toBe(`${'a'.repeat(71)}…`);
    expect(truncated).toHaveLength(72);
  });

  it('should count astral characters as one and never split them', () => {
    const withinLimit = `${'a'.repeat(70)}😀😀`;
    const overLimit = `${'a'.repeat(70)}😀😀😀`;

    expect(truncateSubject(withinLimit)).toBe(withinLimit);
    expect(truncateSubject(overLimit)).toBe(`${'a'.repeat(70)}😀…`);
  });
});

describe('formatFailureReport', () => {
  it('should list each failed commit with its short id and subject', () => {
    const report = formatFailureReport({
      failedCommits: [
        { id: 'c3c3c3c3c3', message: 'bad msg\n\nbody' },
        { id: 'd4', message: 'wip' },
      ],
      checkedCount: 4,
      pattern: '^(feat|fix): .+',
      patternDescription: 'type: description',
    });

    expect(report).toBe(
      [
        '2 out of 4 commit(s) failed validation.',
        'Expected format: type: description',
        'Pattern: ^(feat|fix): .+',
        '',
        'Failed commits:',
        '- c3c3c3c: "bad msg"',
        '- d4: "wip"',
      ].join('\n')
    );
  });
});

describe('serializeFailedCommits', () => {
  it('should serialize id and subject line', () => {
    expect(serializeFailedCommits([{ id: 'c', message: 'bad\n\nbody' }])).toBe('[{"id":"c","message":"bad"}]');
  });

  it('should serialize an empty list', () => {
    expect(serializeFailedCommits([])).toBe('[]');
  });
});

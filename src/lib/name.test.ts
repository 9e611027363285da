import { describe, test, expect } from 'vitest';
import {
  isValidTicketId,
  normalizeName,
  ticketBranchName,
  sanitizeTmuxName,
  ticketSessionName,
} from './name.js';

describe('isValidTicketId', () => {
  test('given typical tracker ids, should accept them', () => {
    expect(isValidTicketId('IN-413')).toBe(true);
    expect(isValidTicketId('bug_42')).toBe(true);
    expect(isValidTicketId('v1.2-hotfix')).toBe(true);
  });

  test('given path-like or empty ids, should reject them', () => {
    expect(isValidTicketId('')).toBe(false);
    expect(isValidTicketId('../etc')).toBe(false);
    expect(isValidTicketId('a/b')).toBe(false);
    expect(isValidTicketId('-flag')).toBe(false);
    expect(isValidTicketId('a..b')).toBe(false);
  });
});

describe('normalizeName', () => {
  test('given spaces, should convert to hyphens', () => {
    expect(normalizeName('Fix Login Bug', 'fb')).toBe('fix-login-bug');
  });

  test('given git-invalid chars, should replace with hyphens', () => {
    expect(normalizeName('feat~1', 'fb')).toBe('feat-1');
    expect(normalizeName('a:b', 'fb')).toBe('a-b');
    expect(normalizeName('test?', 'fb')).toBe('test');
    expect(normalizeName('ref[0]', 'fb')).toBe('ref-0');
  });

  test('given control characters only, should return the fallback', () => {
    expect(normalizeName('\x00\x1f', 'fb')).toBe('fb');
  });

  test('given .lock suffix, should strip it', () => {
    expect(normalizeName('branch.lock', 'fb')).toBe('branch');
  });
});

describe('ticketBranchName', () => {
  test('given id and title, should build a feature branch with a slug', () => {
    expect(ticketBranchName('IN-413', 'Public API bulk uploads')).toBe('feature/IN-413-public-api-bulk-uploads');
  });

  test('given a title with slashes and punctuation, should flatten it', () => {
    expect(ticketBranchName('BUG-42', 'Fix login/logout error!')).toBe('feature/BUG-42-fix-login-logout-error');
  });

  test('given no title, should use the id alone', () => {
    expect(ticketBranchName('BUG-42')).toBe('feature/BUG-42');
  });
});

describe('sanitizeTmuxName', () => {
  test('given name with dots and colons, should replace with hyphens', () => {
    expect(sanitizeTmuxName('tix-my.site.co:8080')).toBe('tix-my-site-co-8080');
  });

  test('given clean name, should return unchanged', () => {
    expect(sanitizeTmuxName('tix-IN-413')).toBe('tix-IN-413');
  });
});

describe('ticketSessionName', () => {
  test('given prefix and id, should join and sanitize', () => {
    expect(ticketSessionName('tix-', 'v1.2')).toBe('tix-v1-2');
  });
});

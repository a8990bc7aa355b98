import { describe, it, expect } from 'vitest';
import { createMockAccessGroup } from '../../../tests/helpers/factories.js';
import {
  UserRole,
  canAccessSection,
  getRoleName,
  isAccessGroupActive,
} from './permissions.js';

describe('permissions', () => {
  const start = new Date('2026-01-08T12:00:00.000Z');
  const end = new Date('2026-01-11T23:00:00.000Z');

  describe('isAccessGroupActive', () => {
    it('is always active without a window', () => {
      expect(isAccessGroupActive({ startTime: null, endTime: null }, start)).toBe(true);
    });

    it('is inactive before the start and after the end', () => {
      const group = { startTime: start, endTime: end };
      expect(isAccessGroupActive(group, new Date('2026-01-08T11:59:59.000Z'))).toBe(false);
      expect(isAccessGroupActive(group, new Date('2026-01-10T00:00:00.000Z'))).toBe(true);
      expect(isAccessGroupActive(group, new Date('2026-01-11T23:00:01.000Z'))).toBe(false);
    });

    it('treats a missing bound as open', () => {
      expect(isAccessGroupActive({ startTime: start, endTime: null }, new Date('2030-01-01'))).toBe(
        true
      );
    });
  });

  describe('canAccessSection', () => {
    it('lets admins through without an access group', () => {
      expect(canAccessSection({ role: UserRole.ADMIN, accessGroup: null }, 'receipts')).toBe(true);
    });

    it('blocks staff without an access group', () => {
      expect(canAccessSection({ role: UserRole.STAFF, accessGroup: null }, 'attendees')).toBe(false);
    });

    it('checks the granted sections', () => {
      const accessGroup = createMockAccessGroup({ sections: ['attendees', 'merch'] });
      expect(canAccessSection({ role: UserRole.STAFF, accessGroup }, 'merch')).toBe(true);
      expect(canAccessSection({ role: UserRole.STAFF, accessGroup }, 'receipts')).toBe(false);
    });

    it('blocks a granted section outside the window', () => {
      const accessGroup = createMockAccessGroup({ sections: ['attendees'], startTime: start, endTime: end });
      expect(
        canAccessSection({ role: UserRole.STAFF, accessGroup }, 'attendees', new Date('2026-02-01'))
      ).toBe(false);
    });
  });

  it('getRoleName', () => {
    expect(getRoleName(0)).toBe('admin');
    expect(getRoleName(1)).toBe('staff');
    expect(getRoleName(7)).toBe('unknown');
  });
});

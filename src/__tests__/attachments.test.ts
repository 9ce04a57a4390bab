import { describe, it, expect } from '@jest/globals';
import { groupPolicies, indexGroups } from '../policy/attachments.js';

const groups = indexGroups([
  {
    GroupName: 'admins',
    AttachedManagedPolicies: [
      { PolicyName: 'AdministratorAccess', PolicyArn: 'arn:aws:iam::aws:policy/AdministratorAccess' },
    ],
  },
  {
    GroupName: 'devs',
    AttachedManagedPolicies: [
      { PolicyName: 'Deploy', PolicyArn: 'arn:aws:iam::123456789012:policy/Deploy' },
      { PolicyName: 'ReadOnlyAccess', PolicyArn: 'arn:aws:iam::aws:policy/ReadOnlyAccess' },
    ],
  },
  { GroupName: 'empty' },
]);

describe('groupPolicies', () => {
  it('lists policies of every group the user is in, in order', () => {
    const identities = groupPolicies({ UserName: 'alice', GroupList: ['admins', 'devs'] }, groups);
    expect(identities.map((i) => i.identifier)).toEqual([
      'arn:aws:iam::aws:policy/AdministratorAccess',
      'arn:aws:iam::123456789012:policy/Deploy',
      'arn:aws:iam::aws:policy/ReadOnlyAccess',
    ]);
    expect(identities.every((i) => i.attachmentKind === 'Group')).toBe(true);
    expect(identities.map((i) => i.provenance)).toEqual(['system-managed', 'custom', 'system-managed']);
  });

  it('returns nothing for a user without groups', () => {
    expect(groupPolicies({ UserName: 'bob' }, groups)).toEqual([]);
    expect(groupPolicies({ UserName: 'carol', GroupList: ['empty'] }, groups)).toEqual([]);
  });

  it('fails on a group missing from the listing', () => {
    expect(() => groupPolicies({ UserName: 'dave', GroupList: ['ops'] }, groups)).toThrow(
      "User dave is in unknown group 'ops'",
    );
  });
});

describe('indexGroups', () => {
  it('keys groups by name and skips unnamed ones', () => {
    const index = indexGroups([{ GroupName: 'a' }, {}]);
    expect(Object.keys(index)).toEqual(['a']);
  });
});

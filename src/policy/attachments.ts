import type { GroupDetail, UserDetail } from '@aws-sdk/client-iam';
import { PolicyIdentity } from './identity.js';

/**
 * Policies a user inherits through group membership.
 *
 * `groups` is keyed by group name, built from the GroupDetailList of
 * GetAccountAuthorizationDetails.
 */
export function groupPolicies(
  user: UserDetail,
  groups: Readonly<Record<string, GroupDetail>>,
): PolicyIdentity[] {
  const identities: PolicyIdentity[] = [];
  for (const groupName of user.GroupList ?? []) {
    const group = groups[groupName];
    if (!group) {
      throw new Error(`User ${user.UserName ?? '(unnamed)'} is in unknown group '${groupName}'`);
    }
    for (const attached of group.AttachedManagedPolicies ?? []) {
      if (attached.PolicyArn) identities.push(new PolicyIdentity(attached.PolicyArn, 'Group'));
    }
  }
  return identities;
}

/** Index a GroupDetailList by group name for {@link groupPolicies}. */
export function indexGroups(groups: readonly GroupDetail[]): Record<string, GroupDetail> {
  const byName: Record<string, GroupDetail> = {};
  for (const group of groups) {
    if (group.GroupName) byName[group.GroupName] = group;
  }
  return byName;
}

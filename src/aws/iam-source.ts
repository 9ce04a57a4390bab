import { GetPolicyCommand, GetPolicyVersionCommand, IAMClient } from '@aws-sdk/client-iam';
import { logger } from '../shared/logger.js';
import type { PolicyDescriptor } from '../policy/detail.js';

/**
 * Remote lookup of policy metadata. Retries and throttling are the client's
 * business; implementations let every failure propagate.
 */
export interface PolicySource {
  getDescriptor(identifier: string): Promise<PolicyDescriptor>;
  getDocument(identifier: string, versionId: string): Promise<unknown>;
}

/**
 * IAM returns policy documents URL-encoded (RFC 3986); decode before parsing.
 */
export function decodePolicyDocument(encoded: string): unknown {
  return JSON.parse(decodeURIComponent(encoded));
}

export class IamPolicySource implements PolicySource {
  private readonly client: IAMClient;

  constructor(client?: IAMClient, options: { region?: string; profile?: string } = {}) {
    this.client =
      client ??
      new IAMClient({
        ...(options.region ? { region: options.region } : {}),
        ...(options.profile ? { profile: options.profile } : {}),
      });
  }

  async getDescriptor(identifier: string): Promise<PolicyDescriptor> {
    logger.debug('Fetching policy descriptor', { arn: identifier });
    const output = await this.client.send(new GetPolicyCommand({ PolicyArn: identifier }));
    const policy = output.Policy;
    if (!policy?.PolicyName || !policy.DefaultVersionId) {
      throw new Error(`IAM returned no policy name or default version for ${identifier}`);
    }
    return {
      name: policy.PolicyName,
      currentVersionId: policy.DefaultVersionId,
      ...(policy.Description !== undefined ? { description: policy.Description } : {}),
    };
  }

  async getDocument(identifier: string, versionId: string): Promise<unknown> {
    logger.debug('Fetching policy version', { arn: identifier, version: versionId });
    const output = await this.client.send(
      new GetPolicyVersionCommand({ PolicyArn: identifier, VersionId: versionId }),
    );
    const encoded = output.PolicyVersion?.Document;
    if (encoded === undefined) {
      throw new Error(`IAM returned no document for ${identifier} version ${versionId}`);
    }
    return decodePolicyDocument(encoded);
  }
}

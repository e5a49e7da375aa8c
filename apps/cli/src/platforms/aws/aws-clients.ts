/**
 * AWS SDK clients configured from the restore configuration
 */

import { EC2Client } from '@aws-sdk/client-ec2';
import { SSMClient } from '@aws-sdk/client-ssm';
import { fromIni } from '@aws-sdk/credential-providers';

export interface AwsClientOptions {
  region: string;
  /** Named profile from the shared credentials file; default chain when absent */
  profile?: string;
}

export interface AwsClients {
  ec2: EC2Client;
  ssm: SSMClient;
}

export function createAwsClients(options: AwsClientOptions): AwsClients {
  const credentials = options.profile ? fromIni({ profile: options.profile }) : undefined;
  return {
    ec2: new EC2Client({ region: options.region, credentials }),
    ssm: new SSMClient({ region: options.region, credentials }),
  };
}

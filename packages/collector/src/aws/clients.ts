/**
 * AWS client wiring: one CloudWatch, DynamoDB and STS client per region,
 * credential selection, credential verification and default-region
 * resolution.
 */

import { CloudWatchClient } from "@aws-sdk/client-cloudwatch";
import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { GetCallerIdentityCommand, STSClient } from "@aws-sdk/client-sts";
import { fromInstanceMetadata } from "@aws-sdk/credential-providers";
import type { Logger } from "pino";
import { ConfigurationError, errorMessage } from "../errors.js";
import type { ConnectFn, RegionClients } from "../collection/orchestrator.js";
import { CloudWatchMetricSource } from "./cloudwatch-source.js";
import { DynamoTableCatalog } from "./dynamodb-catalog.js";
import { getAwsErrorCode } from "./errors.js";

export const FALLBACK_REGION = "us-east-1";
const DEFAULT_MAX_ATTEMPTS = 3;

export interface AwsClientConfig {
  region: string;
  maxAttempts: number;
  /** Named profile from the shared config files */
  profile?: string;
  credentials?: ReturnType<typeof fromInstanceMetadata>;
}

export interface AwsClients {
  cloudwatch: CloudWatchClient;
  dynamodb: DynamoDBClient;
  sts: STSClient;
}

export type AwsClientFactory = (config: AwsClientConfig) => AwsClients;

export interface AwsConnectOptions {
  profile?: string;
  /** Use EC2 instance metadata credentials instead of the default chain */
  instanceProfile?: boolean;
  /** SDK retry budget per call (default: 3) */
  maxAttempts?: number;
  logger?: Logger;
  /** Override client construction (tests) */
  clientFactory?: AwsClientFactory;
}

export interface CallerIdentity {
  accountId: string;
  arn: string;
  userId: string;
}

export function createAwsClients(config: AwsClientConfig): AwsClients {
  const shared = {
    region: config.region,
    maxAttempts: config.maxAttempts,
    ...(config.profile ? { profile: config.profile } : {}),
    ...(config.credentials ? { credentials: config.credentials } : {}),
  };
  return {
    cloudwatch: new CloudWatchClient(shared),
    dynamodb: new DynamoDBClient(shared),
    sts: new STSClient(shared),
  };
}

/** Verify credentials with STS GetCallerIdentity */
export async function verifyCredentials(sts: STSClient): Promise<CallerIdentity> {
  const result = await sts.send(new GetCallerIdentityCommand({}));
  return {
    accountId: result.Account ?? "",
    arn: result.Arn ?? "",
    userId: result.UserId ?? "",
  };
}

/**
 * Region from the environment or shared config for the profile, falling back
 * to us-east-1 when none is configured.
 */
export async function resolveDefaultRegion(profile?: string, logger?: Logger): Promise<string> {
  const sts = new STSClient(profile ? { profile } : {});
  try {
    return await sts.config.region();
  } catch (err) {
    logger?.debug({ err: errorMessage(err) }, `No default region configured, using ${FALLBACK_REGION}`);
    return FALLBACK_REGION;
  } finally {
    sts.destroy();
  }
}

/**
 * Build the orchestrator's `connect` function. Each call creates the region's
 * clients and verifies the credentials before handing them out.
 */
export function createConnector(options?: AwsConnectOptions): ConnectFn {
  const factory = options?.clientFactory ?? createAwsClients;
  const credentials = options?.instanceProfile ? fromInstanceMetadata() : undefined;
  const logger = options?.logger;

  return async (region: string): Promise<RegionClients> => {
    const clients = factory({
      region,
      maxAttempts: options?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
      profile: options?.profile,
      credentials,
    });

    try {
      const identity = await verifyCredentials(clients.sts);
      logger?.info({ region, account: identity.accountId, arn: identity.arn }, "Credentials verified");
    } catch (err) {
      throw new ConfigurationError(
        `Credential verification failed in ${region}`,
        [`${getAwsErrorCode(err)}: ${errorMessage(err)}`],
        { cause: err },
      );
    }

    return {
      metricSource: new CloudWatchMetricSource(clients.cloudwatch),
      catalog: new DynamoTableCatalog(clients.dynamodb),
    };
  };
}

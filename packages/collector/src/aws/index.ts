export { CloudWatchMetricSource, METRIC_NAME, METRIC_NAMESPACE, buildStatisticsInput } from "./cloudwatch-source.js";
export { DynamoTableCatalog } from "./dynamodb-catalog.js";
export {
  createAwsClients,
  createConnector,
  resolveDefaultRegion,
  verifyCredentials,
  FALLBACK_REGION,
} from "./clients.js";
export type { AwsClientConfig, AwsClientFactory, AwsClients, AwsConnectOptions, CallerIdentity } from "./clients.js";
export { getAwsErrorCode, isTransientAwsError } from "./errors.js";

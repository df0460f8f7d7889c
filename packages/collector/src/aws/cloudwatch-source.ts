/**
 * MetricSource backed by CloudWatch `GetMetricStatistics`.
 *
 * Every operation is queried as `SuccessfulRequestLatency` in the
 * `AWS/DynamoDB` namespace, dimensioned by table and operation. Sample
 * counts use the `SampleCount` statistic; latency uses the `p99` extended
 * statistic.
 */

import {
  GetMetricStatisticsCommand,
  type CloudWatchClient,
  type Datapoint,
  type GetMetricStatisticsCommandInput,
} from "@aws-sdk/client-cloudwatch";
import type {
  MetricDatapoint,
  MetricKind,
  MetricQuery,
  MetricSource,
  MetricStatistics,
} from "@ddb-metrics/shared";
import { MetricSourceError, errorMessage } from "../errors.js";
import { getAwsErrorCode, isTransientAwsError } from "./errors.js";

export const METRIC_NAMESPACE = "AWS/DynamoDB";
export const METRIC_NAME = "SuccessfulRequestLatency";
const P99 = "p99";

export function buildStatisticsInput(query: MetricQuery): GetMetricStatisticsCommandInput {
  const input: GetMetricStatisticsCommandInput = {
    Namespace: METRIC_NAMESPACE,
    MetricName: METRIC_NAME,
    Dimensions: [
      { Name: "TableName", Value: query.table },
      { Name: "Operation", Value: query.operation },
    ],
    StartTime: query.start,
    EndTime: query.end,
    Period: query.periodSeconds,
  };
  if (query.metricKind === "SampleCount") {
    input.Statistics = ["SampleCount"];
  } else {
    input.ExtendedStatistics = [P99];
  }
  return input;
}

function toDatapoint(metricKind: MetricKind, dp: Datapoint): MetricDatapoint {
  const value = metricKind === "SampleCount" ? dp.SampleCount : dp.ExtendedStatistics?.[P99];
  if (!dp.Timestamp || value === undefined) {
    throw new MetricSourceError(`Malformed ${metricKind} datapoint in response`, false);
  }
  return {
    timestamp: dp.Timestamp.toISOString(),
    value,
    ...(dp.Unit ? { unit: dp.Unit } : {}),
  };
}

export class CloudWatchMetricSource implements MetricSource {
  private client: CloudWatchClient;

  constructor(client: CloudWatchClient) {
    this.client = client;
  }

  async getStatistics(query: MetricQuery): Promise<MetricStatistics> {
    const output = await this.client
      .send(new GetMetricStatisticsCommand(buildStatisticsInput(query)))
      .catch((err: unknown) => {
        throw new MetricSourceError(
          `${getAwsErrorCode(err)}: ${errorMessage(err)}`,
          isTransientAwsError(err),
          { cause: err },
        );
      });

    return {
      label: output.Label ?? METRIC_NAME,
      datapoints: (output.Datapoints ?? []).map((dp) => toDatapoint(query.metricKind, dp)),
    };
  }
}

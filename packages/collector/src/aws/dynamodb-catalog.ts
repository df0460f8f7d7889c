/**
 * TableCatalog backed by the DynamoDB control plane of one region.
 */

import {
  DescribeTableCommand,
  ListTablesCommand,
  type DynamoDBClient,
} from "@aws-sdk/client-dynamodb";
import type { TableCatalog, TableDescription } from "@ddb-metrics/shared";

/** Largest page ListTables returns */
const LIST_PAGE_SIZE = 100;

export class DynamoTableCatalog implements TableCatalog {
  private client: DynamoDBClient;

  constructor(client: DynamoDBClient) {
    this.client = client;
  }

  /** Page through ListTables until no continuation key is returned */
  async listTables(): Promise<string[]> {
    const names: string[] = [];
    let startAfter: string | undefined;

    do {
      const page = await this.client.send(
        new ListTablesCommand({ ExclusiveStartTableName: startAfter, Limit: LIST_PAGE_SIZE }),
      );
      names.push(...(page.TableNames ?? []));
      startAfter = page.LastEvaluatedTableName;
    } while (startAfter);

    return names;
  }

  async describe(table: string): Promise<TableDescription> {
    const { Table } = await this.client.send(new DescribeTableCommand({ TableName: table }));
    if (!Table?.CreationDateTime) {
      throw new Error(`DescribeTable returned no creation time for ${table}`);
    }
    return {
      tableName: Table.TableName ?? table,
      creationTime: Table.CreationDateTime,
      status: Table.TableStatus,
      itemCount: Table.ItemCount,
      sizeBytes: Table.TableSizeBytes,
    };
  }
}

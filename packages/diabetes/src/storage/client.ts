/**
 * DynamoDB client configuration
 */

import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";

export interface DocClientOptions {
  /** Defaults to AWS_REGION, then us-east-1 */
  region?: string;
  /** Local endpoint such as DynamoDB Local */
  endpoint?: string;
}

/**
 * Create a Document Client that drops undefined attributes,
 * so readings without dialog fields store cleanly.
 */
export function createDocClient(options: DocClientOptions = {}): DynamoDBDocumentClient {
  const client = new DynamoDBClient({
    region: options.region ?? process.env.AWS_REGION ?? "us-east-1",
    endpoint: options.endpoint,
  });
  return DynamoDBDocumentClient.from(client, {
    marshallOptions: {
      removeUndefinedValues: true,
    },
  });
}

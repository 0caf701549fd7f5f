import { DynamoDB } from 'aws-sdk';

export type DocumentClientConfig = DynamoDB.DocumentClient.DocumentClientOptions &
  DynamoDB.Types.ClientConfiguration;

/**
 * DocumentClient configuration from the environment.
 * DYNAMODB_ENDPOINT points the client at a local DynamoDB.
 */
export function documentClientConfig(env: NodeJS.ProcessEnv = process.env): DocumentClientConfig {
  return {
    region: env.AWS_REGION || 'us-east-1',
    ...(env.DYNAMODB_ENDPOINT ? { endpoint: env.DYNAMODB_ENDPOINT } : {})
  };
}

/**
 * Shared DynamoDB DocumentClient instance
 */
export const documentClient = new DynamoDB.DocumentClient(documentClientConfig());

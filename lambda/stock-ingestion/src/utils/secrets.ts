/**
 * AWS Secrets Manager and SSM Parameter Store helper for retrieving credentials
 *
 * Values are cached per Lambda container to avoid repeated API calls
 */

import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import { SSMClient, GetParameterCommand } from '@aws-sdk/client-ssm';

const secretsClient = new SecretsManagerClient({ region: process.env.AWS_REGION || 'us-west-2' });
const ssmClient = new SSMClient({ region: process.env.AWS_REGION || 'us-west-2' });

const secretCache: Record<string, string> = {};
const parameterCache: Record<string, string> = {};

/**
 * Retrieve a secret from AWS Secrets Manager with caching
 * @param secretName The name/ARN of the secret
 */
export async function getSecret(secretName: string): Promise<string> {
    if (secretCache[secretName]) {
        return secretCache[secretName];
    }

    try {
        console.log(`Fetching secret from Secrets Manager: ${secretName}`);
        const response = await secretsClient.send(new GetSecretValueCommand({ SecretId: secretName }));

        if (!response.SecretString) {
            throw new Error(`Secret ${secretName} has no string value`);
        }

        secretCache[secretName] = response.SecretString;
        return response.SecretString;

    } catch (error) {
        console.error(`Failed to retrieve secret ${secretName}:`, error);
        throw error;
    }
}

/**
 * Retrieve a parameter from AWS Systems Manager Parameter Store with caching
 * @param parameterName The name of the SSM parameter
 * @param withDecryption Whether to decrypt SecureString parameters
 */
export async function getParameter(parameterName: string, withDecryption: boolean = true): Promise<string> {
    if (parameterCache[parameterName]) {
        return parameterCache[parameterName];
    }

    try {
        console.log(`Fetching parameter from SSM Parameter Store: ${parameterName}`);
        const response = await ssmClient.send(new GetParameterCommand({
            Name: parameterName,
            WithDecryption: withDecryption
        }));

        if (!response.Parameter?.Value) {
            throw new Error(`Parameter ${parameterName} has no value`);
        }

        parameterCache[parameterName] = response.Parameter.Value;
        return response.Parameter.Value;

    } catch (error) {
        console.error(`Failed to retrieve parameter ${parameterName}:`, error);
        throw error;
    }
}

/**
 * Extract the password from a database secret.
 * RDS-managed secrets are JSON documents with a `password` field; plain secrets are the password itself.
 */
export function extractPassword(secretValue: string): string {
    const trimmed = secretValue.trim();
    if (!trimmed.startsWith('{')) {
        return secretValue;
    }

    try {
        const parsed: unknown = JSON.parse(trimmed);
        if (typeof parsed === 'object' && parsed !== null && 'password' in parsed && typeof parsed.password === 'string') {
            return parsed.password;
        }
    } catch (error) {
        console.warn('Database secret is not valid JSON; using it as the password:', error instanceof Error ? error.message : String(error));
    }
    return secretValue;
}

export async function getPostgresPassword(secretName: string): Promise<string> {
    return extractPassword(await getSecret(secretName));
}

export async function getAlphaVantageApiKey(parameterName: string): Promise<string> {
    return getParameter(parameterName);
}

import {
  SecretsManagerClient,
  GetSecretValueCommand,
} from '@aws-sdk/client-secrets-manager';
import { isRecord } from './validate-config';

/** Environment variables a deployment may take from Secrets Manager */
const SECRET_VARS = ['DATABASE_URL'] as const;

/**
 * Fill missing secrets from AWS Secrets Manager.
 *
 * - Local dev: .env (via dotenv) or the shell provides them; nothing is fetched
 * - AWS: set AWS_SECRET_NAME to a JSON secret holding the same keys
 *
 * Without DATABASE_URL the pipeline falls back to the file proposal store,
 * so an absent secret is not an error unless a secret name was configured.
 */
export async function loadSecrets(
  env: NodeJS.ProcessEnv = process.env,
  client?: Pick<SecretsManagerClient, 'send'>
): Promise<void> {
  const missing = SECRET_VARS.filter((name) => !env[name]);
  if (missing.length === 0) {
    console.log('[Secrets] All secrets available from environment');
    return;
  }

  const secretName = env.AWS_SECRET_NAME;
  if (!secretName) {
    return;
  }

  const region = env.AWS_REGION || 'us-east-1';
  console.log(`[Secrets] Loading ${missing.join(', ')} from AWS Secrets Manager: ${secretName}`);

  try {
    const secretsClient = client ?? new SecretsManagerClient({ region });
    const response = await secretsClient.send(new GetSecretValueCommand({ SecretId: secretName }));

    if (!response.SecretString) {
      throw new Error('Secret has no string value');
    }

    const secrets: unknown = JSON.parse(response.SecretString);
    if (!isRecord(secrets)) {
      throw new Error('Secret is not a JSON object');
    }

    for (const name of missing) {
      const value = secrets[name];
      if (typeof value === 'string' && value) {
        env[name] = value;
      }
    }

    console.log('[Secrets] Secrets loaded from AWS Secrets Manager');
  } catch (error) {
    console.error('[Secrets] Failed to load secrets from AWS Secrets Manager:', error);
    throw new Error(
      `Secret ${secretName} could not be loaded. Set ${missing.join(', ')} or fix the AWS configuration.`
    );
  }
}

export const CREDENTIALS_MISSING_MESSAGE = 'AWS credentials not configured';
export const CREDENTIALS_HINT = "Run 'aws configure' to set up credentials";

const CREDENTIAL_ERROR_NAMES = new Set([
  'CredentialsProviderError',
  'ExpiredToken',
  'ExpiredTokenException',
  'UnrecognizedClientException',
  'InvalidClientTokenId',
  'AuthFailure',
]);

export interface AwsErrorDescription {
  message: string;
  hint?: string;
  code?: string;
}

// SDK v3 서비스 예외는 $metadata를 가진다
function isServiceException(
  error: Error,
): error is Error & { $metadata: { httpStatusCode?: number } } {
  return '$metadata' in error;
}

/**
 * Turns an AWS SDK failure into a message fit for the console.
 */
export function describeAwsError(error: unknown): AwsErrorDescription {
  if (!(error instanceof Error)) {
    return { message: String(error) };
  }

  if (error.name === 'CredentialsProviderError') {
    return { message: CREDENTIALS_MISSING_MESSAGE, hint: CREDENTIALS_HINT };
  }

  if (CREDENTIAL_ERROR_NAMES.has(error.name)) {
    return {
      message: error.message || error.name,
      hint: CREDENTIALS_HINT,
      code: error.name,
    };
  }

  if (isServiceException(error)) {
    return { message: error.message || error.name, code: error.name };
  }

  return { message: error.message || error.name };
}

export function formatAwsError(description: AwsErrorDescription): string {
  const code = description.code ? ` (${description.code})` : '';
  return `${description.message}${code}`;
}

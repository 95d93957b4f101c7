import { DecryptCommand, KMSClient } from "@aws-sdk/client-kms";
import { ConfigurationError } from "./errors";

/** Turns one base64 ciphertext into plaintext. */
export type SecretDecrypter = (ciphertext: string) => Promise<string>;

/**
 * KMS decrypter for environment variables encrypted with a Lambda's
 * encryption helpers. The function name is bound into the encryption
 * context, so ciphertexts only open inside the function they were made for.
 */
export function createKmsDecrypter(region: string, functionName: string | undefined): SecretDecrypter {
  if (!functionName) {
    throw new ConfigurationError("AWS_LAMBDA_FUNCTION_NAME must be set to decrypt ENV_ENCRYPTED variables");
  }
  const kms = new KMSClient({ region });

  return async (ciphertext) => {
    const resp = await kms.send(
      new DecryptCommand({
        CiphertextBlob: Buffer.from(ciphertext, "base64"),
        EncryptionContext: { LambdaFunctionName: functionName },
      })
    );
    if (!resp.Plaintext) {
      throw new ConfigurationError("KMS returned no plaintext");
    }
    return Buffer.from(resp.Plaintext).toString("utf-8");
  };
}

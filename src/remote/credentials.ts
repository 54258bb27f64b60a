/**
 * Credential providers for the remote API
 */

import { ConnectionNotConfiguredError } from "./errors.js";

import type { Connection } from "../db/types.js";
import type { SecretCipher } from "../utils/crypto.js";

export type RemoteConnection = Pick<
  Connection,
  "id" | "name" | "base_url" | "client_id" | "client_secret_encrypted"
>;

/**
 * Produces the authentication headers for one request. The plaintext
 * secret only exists while the headers are being built.
 */
export interface CredentialProvider {
  getHeaders(connection: RemoteConnection): Promise<Record<string, string>>;
}

/**
 * HTTP Basic with the client id and the decrypted client secret. The
 * cipher may be passed as a factory so a missing key only fails requests.
 */
export class BasicAuthCredentials implements CredentialProvider {
  constructor(private readonly cipher: SecretCipher | (() => SecretCipher)) {}

  async getHeaders(
    connection: RemoteConnection
  ): Promise<Record<string, string>> {
    if (
      connection.client_secret_encrypted === null ||
      connection.client_id === ""
    ) {
      throw new ConnectionNotConfiguredError();
    }

    const cipher =
      typeof this.cipher === "function" ? this.cipher() : this.cipher;
    const secret = cipher.decrypt(connection.client_secret_encrypted);
    const token = Buffer.from(`${connection.client_id}:${secret}`).toString(
      "base64"
    );
    return { Authorization: `Basic ${token}` };
  }
}

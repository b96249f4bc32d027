/**
 * Lookup of currently valid API keys
 */
export interface ICredentialStore {
  /**
   * Initialize the credential store (connect, warm caches)
   */
  initialize(): Promise<void>;

  /**
   * Whether the key is a currently valid credential
   * @param key API key presented by the caller
   */
  isValid(key: string): Promise<boolean>;
}

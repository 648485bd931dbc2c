/** Plaintext copy of an encrypted credential kept for the resolver scope. */
export interface DecryptedCredential {
  /** Temporary directory holding the plaintext file. */
  directory: string

  /** Encrypted file the credential was decrypted from. */
  source: string

  /** Path of the plaintext file. */
  path: string
}

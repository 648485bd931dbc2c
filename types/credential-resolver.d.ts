/** Resolves credential files, decrypting `.gpg` files at most once. */
export interface CredentialResolver {
  /** Return a plaintext path for the given credential path. */
  resolve(path: string): Promise<string>

  /** Remove every decrypted temporary file. */
  dispose(): Promise<void>

  /** Remove every decrypted temporary file without waiting on pending work. */
  disposeSync(): void
}

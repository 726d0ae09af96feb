import { customAlphabet, nanoid } from 'nanoid';

const credentialAlphabet = customAlphabet('0123456789abcdefghijklmnopqrstuvwxyz', 10);

export function generateId(size = 12): string {
  return nanoid(size);
}

/** Lowercase id that is easy to type on the command line */
export function generateCredentialId(): string {
  return credentialAlphabet();
}

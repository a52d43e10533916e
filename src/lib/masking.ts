/**
 * Centralized masking for credential material
 *
 * Every place that shows a credential or scrubs diagnostic text goes through here.
 */

import type { Credentials } from '../types.js'

export const REDACTED = '********'

/**
 * Replace every occurrence of the given secrets in a text.
 * Empty secrets are ignored; longer secrets are replaced first so that a
 * secret containing another one is never half-revealed.
 */
export function redactSecrets(text: string, secrets: readonly string[]): string {
  const ordered = secrets
    .filter(secret => secret.length > 0)
    .sort((a, b) => b.length - a.length)

  let result = text
  for (const secret of ordered) {
    result = result.split(secret).join(REDACTED)
  }
  return result
}

/**
 * Credentials as they may appear in logs: the username and a hidden password
 *
 * @example
 * describeCredentials(creds)
 * // => 'netops/<hidden>'
 */
export function describeCredentials(credentials: Pick<Credentials, 'username'>): string {
  return `${credentials.username}/<hidden>`
}

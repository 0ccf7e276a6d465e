/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import { z } from 'zod'
import { Error } from './base'

/** An amount of ICP, in e8s. */
export interface Tokens { e8s: bigint }

/** Number of e8s in one whole token. */
export const E8S_PER_TOKEN = 100_000_000n

/** Largest amount a 64-bit ledger balance can hold. */
export const MAX_E8S = 2n**64n - 1n

/** Default fee of the ICP ledger. */
export const DEFAULT_TRANSFER_FEE: Tokens = { e8s: 10_000n }

export const tokensSchema = z.object({ e8s: z.bigint().nonnegative().max(MAX_E8S) })

export const natSchema = z.bigint().nonnegative()

export const nat64Schema = z.bigint().nonnegative().max(MAX_E8S)

export function e8s (value: bigint|number): Tokens {
  const amount = BigInt(value)
  if (amount < 0n || amount > MAX_E8S) throw new Error.InvalidTokens(String(value))
  return { e8s: amount }
}

/** Parse a decimal amount of whole tokens, such as `1.5`, with at most 8 decimals. */
export function parseTokens (text: string): Tokens {
  const match = /^(\d+)(?:\.(\d{1,8}))?$/.exec(text.replace(/_/g, ''))
  if (!match) throw new Error.InvalidTokens(text)
  const [, whole, fraction = ''] = match
  return e8s(BigInt(whole) * E8S_PER_TOKEN + BigInt(fraction.padEnd(8, '0')))
}

/** Format as whole tokens with 8 decimals. */
export function formatTokens ({ e8s }: Tokens): string {
  const whole = e8s / E8S_PER_TOKEN
  const fraction = String(e8s % E8S_PER_TOKEN).padStart(8, '0')
  return `${whole}.${fraction}`
}

export function addTokens (a: Tokens, b: Tokens): Tokens {
  return e8s(a.e8s + b.e8s)
}

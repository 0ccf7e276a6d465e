/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import { Principal } from '@dfinity/principal'
import { bytesToHex } from '@noble/hashes/utils'
import Console, { bold, colors } from './AgentConsole'
import IccError from './AgentError'

export { bytesToHex, hexToBytes, utf8ToBytes, concatBytes } from '@noble/hashes/utils'

export class Logged {
  log: Console
  constructor (properties?: { log?: Console }) {
    this.log = properties?.log ?? new Console(this.constructor.name)
  }
}

/** Run an async operation and report how long it took. */
export async function timed <T> (
  fn: ()=>Promise<T>, cb: (ctx: { elapsed: string, result: T })=>unknown
): Promise<T> {
  const t0 = performance.now()
  const result = await fn()
  const t1 = performance.now()
  cb({
    elapsed: ((t1-t0)/1000).toFixed(3)+'s',
    result
  })
  return result
}

/** An unbounded natural number. */
export type Nat = bigint

/** A 64-bit natural number. */
export type Nat64 = bigint

/** Nanoseconds since the Unix epoch. */
export type Nanos = bigint

/** An amount of cycles. */
export type Cycles = bigint

/** Name of a canister method. */
export type Method = string

/** Name of a canister in a project. */
export type Name = string

export const NANOS_PER_SECOND = 1_000_000_000n

/** Render a value returned by a canister the way error messages show it:
  * single-key objects with a capitalized key are variants. */
export function describe (value: unknown): string {
  if (value === null || value === undefined) return 'null'
  if (typeof value === 'bigint' || typeof value === 'number' || typeof value === 'boolean') {
    return String(value)
  }
  if (typeof value === 'string') return JSON.stringify(value)
  if (value instanceof Principal) return value.toText()
  if (value instanceof Uint8Array) return bytesToHex(value)
  if (Array.isArray(value)) return `[${value.map(describe).join(', ')}]`
  if (typeof value === 'object') {
    const entries = Object.entries(value)
    if (entries.length === 1 && /^[A-Z]/.test(entries[0][0])) {
      const [tag, payload] = entries[0]
      return (payload === null) ? tag : `${tag} ${describe(payload)}`
    }
    if (entries.length === 0) return '{}'
    return `{ ${entries.map(([k, v])=>`${k}: ${describe(v)}`).join(', ')} }`
  }
  return String(value)
}

export {
  Console,
  IccError as Error,
  bold,
  colors
}

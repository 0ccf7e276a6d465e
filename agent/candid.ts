/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import { z } from 'zod'
import type { Principal } from '@dfinity/principal'
import { bytesToHex } from '@noble/hashes/utils'

/** A Candid value, as passed to `dfx` on the command line or to a canister. */
export type Candid =
  | { kind: 'null' }
  | { kind: 'bool', value: boolean }
  | { kind: 'nat', value: bigint }
  | { kind: 'nat64', value: bigint }
  | { kind: 'text', value: string }
  | { kind: 'principal', value: Principal }
  | { kind: 'blob', value: Uint8Array }
  | { kind: 'opt', value?: Candid }
  | { kind: 'vec', items: Candid[] }
  | { kind: 'record', fields: Array<[string, Candid]> }
  | { kind: 'tuple', items: Candid[] }
  | { kind: 'variant', tag: string, value?: Candid }

/** The shape a Candid value takes once decoded on the JS side.
  * `opt` becomes `[]` or `[x]`, records become objects, variants single-key objects. */
export type JsValue =
  | null | boolean | bigint | string | Principal | Uint8Array
  | JsValue[]
  | { [key: string]: JsValue }

export const Candid = {
  null: (): Candid => ({ kind: 'null' }),
  bool: (value: boolean): Candid => ({ kind: 'bool', value }),
  nat: (value: bigint|number): Candid => ({ kind: 'nat', value: BigInt(value) }),
  nat64: (value: bigint|number): Candid => ({ kind: 'nat64', value: BigInt(value) }),
  text: (value: string): Candid => ({ kind: 'text', value }),
  principal: (value: Principal): Candid => ({ kind: 'principal', value }),
  blob: (value: Uint8Array): Candid => ({ kind: 'blob', value }),
  some: (value: Candid): Candid => ({ kind: 'opt', value }),
  none: (): Candid => ({ kind: 'opt' }),
  vec: (...items: Candid[]): Candid => ({ kind: 'vec', items }),
  record: (fields: Record<string, Candid>): Candid => ({ kind: 'record', fields: Object.entries(fields) }),
  tuple: (...items: Candid[]): Candid => ({ kind: 'tuple', items }),
  variant: (tag: string, value?: Candid): Candid => ({ kind: 'variant', tag, value }),
}

/** Decoder for a Candid `opt`, which arrives as `[]` or `[value]`. */
export function opt <T extends z.ZodTypeAny> (schema: T) {
  return z.union([z.tuple([]), z.tuple([schema])])
}

/** Render a list of values as a Candid argument tuple: `(a, b)`. */
export function renderArgs (values: Candid[]): string {
  return `(${values.map(render).join(', ')})`
}

/** Render a value in Candid text format. */
export function render (value: Candid): string {
  switch (value.kind) {
    case 'null':
      return 'null'
    case 'bool':
      return String(value.value)
    case 'nat':
      return groupDigits(value.value)
    case 'nat64':
      return `${groupDigits(value.value)} : nat64`
    case 'text':
      return quote(value.value)
    case 'principal':
      return `principal ${quote(value.value.toText())}`
    case 'blob':
      return `blob "${bytesToHex(value.value).replace(/(..)/g, '\\$1')}"`
    case 'opt':
      return value.value ? `opt ${render(value.value)}` : 'null'
    case 'vec':
      return block('vec', value.items.map(render))
    case 'tuple':
      return block('record', value.items.map(render))
    case 'record':
      return block('record', value.fields.map(([name, field])=>`${label(name)} = ${render(field)}`))
    case 'variant':
      return value.value
        ? `variant { ${label(value.tag)} = ${render(value.value)} }`
        : `variant { ${label(value.tag)} }`
  }
}

/** Convert a value to the shape a canister receives it in. */
export function toJs (value: Candid): JsValue {
  switch (value.kind) {
    case 'null':
      return null
    case 'bool':
    case 'nat':
    case 'nat64':
    case 'text':
    case 'principal':
    case 'blob':
      return value.value
    case 'opt':
      return value.value ? [toJs(value.value)] : []
    case 'vec':
    case 'tuple':
      return value.items.map(toJs)
    case 'record':
      return Object.fromEntries(value.fields.map(([name, field])=>[name, toJs(field)]))
    case 'variant':
      return { [value.tag]: value.value ? toJs(value.value) : null }
  }
}

function block (keyword: string, items: string[]) {
  return (items.length === 0) ? `${keyword} {}` : `${keyword} { ${items.map(x=>`${x}; `).join('')}}`
}

function label (name: string) {
  return /^[A-Za-z_][A-Za-z0-9_]*$/.test(name) ? name : quote(name)
}

function groupDigits (value: bigint) {
  return String(value).replace(/\B(?=(\d{3})+(?!\d))/g, '_')
}

function quote (text: string) {
  let escaped = ''
  for (const char of text) {
    switch (char) {
      case '\n': escaped += '\\n'; break
      case '\r': escaped += '\\r'; break
      case '\t': escaped += '\\t'; break
      case '\\': escaped += '\\\\'; break
      case '"':  escaped += '\\"'; break
      case "'":  escaped += "\\'"; break
      default: {
        const code = char.codePointAt(0) ?? 0
        escaped += (code < 0x20 || code === 0x7f) ? `\\u{${code.toString(16)}}` : char
      }
    }
  }
  return `"${escaped}"`
}

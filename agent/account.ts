/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import { Principal } from '@dfinity/principal'
import { sha224 } from '@noble/hashes/sha256'
import CRC32 from 'crc-32'
import { z } from 'zod'
import { Error, bytesToHex, concatBytes, hexToBytes, utf8ToBytes } from './base'

const ACCOUNT_DOMAIN_SEPARATOR = utf8ToBytes('\x0Aaccount-id')

export const SUBACCOUNT_LENGTH = 32

export const ACCOUNT_ID_LENGTH = 32

/** One of 2^256 accounts a principal can hold on the ledger. */
export class Subaccount {

  static readonly ZERO = new Subaccount(new Uint8Array(SUBACCOUNT_LENGTH))

  private constructor (readonly bytes: Uint8Array) {}

  static fromBytes (bytes: Uint8Array): Subaccount {
    if (bytes.length !== SUBACCOUNT_LENGTH) throw new Error.InvalidSubaccount(bytes.length)
    return new Subaccount(Uint8Array.from(bytes))
  }

  /** Subaccount whose last 8 bytes hold the given number, big-endian. */
  static fromIndex (index: bigint|number): Subaccount {
    const bytes = new Uint8Array(SUBACCOUNT_LENGTH)
    new DataView(bytes.buffer).setBigUint64(SUBACCOUNT_LENGTH - 8, BigInt(index))
    return new Subaccount(bytes)
  }

  /** Subaccount derived from a principal: length byte, then the principal's bytes. */
  static fromPrincipal (principal: Principal): Subaccount {
    const raw = principal.toUint8Array()
    const bytes = new Uint8Array(SUBACCOUNT_LENGTH)
    bytes[0] = raw.length
    bytes.set(raw, 1)
    return new Subaccount(bytes)
  }

  isZero (): boolean {
    return this.bytes.every(byte=>byte === 0)
  }

  toHex (): string {
    return bytesToHex(this.bytes)
  }
}

/** Address of an account on the ICP ledger:
  * big-endian CRC32 of the hash, followed by the 28-byte hash itself. */
export class AccountIdentifier {

  private constructor (readonly bytes: Uint8Array) {}

  static fromPrincipal (principal: Principal, subaccount: Subaccount|Uint8Array = Subaccount.ZERO) {
    const sub = (subaccount instanceof Subaccount) ? subaccount : Subaccount.fromBytes(subaccount)
    const hash = sha224(concatBytes(ACCOUNT_DOMAIN_SEPARATOR, principal.toUint8Array(), sub.bytes))
    return new AccountIdentifier(concatBytes(crc32(hash), hash))
  }

  /** Parse 64 hex digits, verifying the checksum. */
  static fromHex (hex: string): AccountIdentifier {
    if (!/^[0-9a-fA-F]{64}$/.test(hex)) {
      throw new Error.InvalidAccountId(`expected 64 hex digits, got "${hex}"`)
    }
    return AccountIdentifier.fromBytes(hexToBytes(hex.toLowerCase()))
  }

  /** Validate 32 bytes of account identifier, verifying the checksum. */
  static fromBytes (bytes: Uint8Array): AccountIdentifier {
    if (bytes.length !== ACCOUNT_ID_LENGTH) {
      throw new Error.InvalidAccountId(`expected ${ACCOUNT_ID_LENGTH} bytes, got ${bytes.length}`)
    }
    const expected = bytesToHex(crc32(bytes.subarray(4)))
    const actual = bytesToHex(bytes.subarray(0, 4))
    if (expected !== actual) {
      throw new Error.InvalidAccountId(`checksum mismatch (expected ${expected}, found ${actual})`)
    }
    return new AccountIdentifier(Uint8Array.from(bytes))
  }

  /** The 28-byte hash, without checksum. */
  get hash (): Uint8Array {
    return this.bytes.subarray(4)
  }

  equals (other: AccountIdentifier): boolean {
    return this.toHex() === other.toHex()
  }

  toHex (): string {
    return bytesToHex(this.bytes)
  }

  toString (): string {
    return this.toHex()
  }
}

/** An account as addressed by the ICRC-1 interface. */
export interface Account {
  owner: Principal
  subaccount: [] | [Uint8Array]
}

export function accountOf (owner: Principal, subaccount?: Uint8Array): Account {
  return { owner, subaccount: subaccount ? [subaccount] : [] }
}

/** ICP ledger address of an ICRC-1 account. */
export function accountIdentifierOf ({ owner, subaccount }: Account): AccountIdentifier {
  return AccountIdentifier.fromPrincipal(owner, subaccount[0] ?? Subaccount.ZERO)
}

export const principalSchema = z.instanceof(Principal)

export const blobSchema = z.instanceof(Uint8Array)

export const accountSchema = z.object({
  owner: principalSchema,
  subaccount: z.union([z.tuple([]), z.tuple([blobSchema])]),
})

function crc32 (data: Uint8Array): Uint8Array {
  const checksum = new Uint8Array(4)
  new DataView(checksum.buffer).setUint32(0, CRC32.buf(data) >>> 0)
  return checksum
}

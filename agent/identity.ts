/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import { Principal } from '@dfinity/principal'
import { Secp256k1, sha256 } from '@cosmjs/crypto'
import { Logged, Error, concatBytes, hexToBytes, utf8ToBytes } from './base'
import type { Console } from './base'

export { Principal }

/** The management canister, `aaaaa-aa`. */
export const MANAGEMENT_CANISTER = Principal.managementCanister()

/** DER prefix of a secp256k1 SubjectPublicKeyInfo with an uncompressed key. */
const SECP256K1_SPKI_PREFIX = hexToBytes('3056301006072a8648ce3d020106052b8104000a034200')

/** Parse the textual form of a principal. */
export function parsePrincipal (text: string): Principal {
  try {
    return Principal.fromText(text)
  } catch (e) {
    throw new Error.InvalidPrincipal(text, (e instanceof globalThis.Error) ? e.message : String(e))
  }
}

/** Opaque id of the canister at a given 64-bit index:
  * the index in big-endian followed by `0x01 0x01`. */
export function canisterIdFromIndex (index: bigint|number): Principal {
  const value = BigInt(index)
  if (value < 0n || value >= 2n**64n) {
    throw new Error.InvalidCanisterIndex(value)
  }
  const bytes = new Uint8Array(10)
  new DataView(bytes.buffer).setBigUint64(0, value)
  bytes[8] = 0x01
  bytes[9] = 0x01
  return Principal.fromUint8Array(bytes)
}

/** Index of a canister id, or `undefined` if it's not an opaque id. */
export function canisterIndexOf (principal: Principal): bigint|undefined {
  const bytes = principal.toUint8Array()
  if (bytes.length !== 10 || bytes[8] !== 0x01 || bytes[9] !== 0x01) return undefined
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getBigUint64(0)
}

export function isSelfAuthenticating (principal: Principal): boolean {
  const bytes = principal.toUint8Array()
  return bytes.length === 29 && bytes[28] === 0x02
}

/** DER-encode an uncompressed secp256k1 public key. */
export function derEncodeSecp256k1 (publicKey: Uint8Array): Uint8Array {
  return concatBytes(SECP256K1_SPKI_PREFIX, publicKey)
}

/** A user holding a secp256k1 key pair. */
export class Identity extends Logged {
  /** Display name of the identity. */
  name?: string
  /** Principal derived from the public key, or the anonymous principal. */
  principal: Principal
  /** Uncompressed public key. */
  publicKey?: Uint8Array

  #privateKey?: Uint8Array

  constructor (properties: {
    principal: Principal, name?: string, publicKey?: Uint8Array, privateKey?: Uint8Array, log?: Console
  }) {
    super(properties)
    this.principal = properties.principal
    this.name = properties.name
    this.publicKey = properties.publicKey
    this.#privateKey = properties.privateKey
  }

  static anonymous (): Identity {
    return new Identity({ name: 'anonymous', principal: Principal.anonymous() })
  }

  /** Deterministically derive an identity from a seed phrase. */
  static async fromSeed (seed: string|Uint8Array, name?: string): Promise<Identity> {
    const privateKey = sha256((typeof seed === 'string') ? utf8ToBytes(seed) : seed)
    const { pubkey } = await Secp256k1.makeKeypair(privateKey)
    return new Identity({
      name,
      principal: Principal.selfAuthenticating(derEncodeSecp256k1(pubkey)),
      publicKey: pubkey,
      privateKey
    })
  }

  get canSign (): boolean {
    return !!this.#privateKey
  }

  /** Sign the SHA-256 of the given bytes. Returns the 64-byte `r || s` signature. */
  async sign (data: Uint8Array): Promise<Uint8Array> {
    if (!this.#privateKey) {
      throw new Error(`Identity ${this.name ?? this.principal.toText()} can't sign`)
    }
    const signature = await Secp256k1.createSignature(sha256(data), this.#privateKey)
    return concatBytes(signature.r(32), signature.s(32))
  }

  toString () {
    return this.principal.toText()
  }
}

/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import { z } from 'zod'
import { Secp256k1, sha256 } from '@cosmjs/crypto'
import type { Principal } from '@dfinity/principal'
import { concatBytes, utf8ToBytes } from '../agent/base'
import { Canister, defineCanister, reject } from '../agent/canister'
import type { CanisterContext, IncomingMessage } from '../agent/canister'
import {
  ECDSA_KEY_NAMES, SIGN_WITH_ECDSA_FEE, ecdsaPublicKeyArgsSchema, signWithEcdsaArgsSchema
} from '../agent/management'
import type { EcdsaPublicKeyArgs, SignWithEcdsaArgs } from '../agent/management'

/** The threshold ECDSA endpoints of the management canister.
  * Keys are derived from the replica seed, the key name,
  * the owning canister and the derivation path. */
export class ManagementCanister extends Canister {

  constructor (ic: CanisterContext, readonly seed: string) {
    super(ic)
    this.update('sign_with_ecdsa', z.tuple([signWithEcdsaArgsSchema]),
      ([args], message) => this.signWithEcdsa(args, message))
    this.update('ecdsa_public_key', z.tuple([ecdsaPublicKeyArgsSchema]),
      ([args], message) => this.ecdsaPublicKey(args, message))
  }

  async signWithEcdsa (
    { message_hash, derivation_path, key_id }: SignWithEcdsaArgs, message: IncomingMessage
  ) {
    this.requireKey(key_id.name)
    if (message_hash.length !== 32) {
      reject(`message_hash must be 32 bytes, got ${message_hash.length}`)
    }
    if (message.cycles < SIGN_WITH_ECDSA_FEE) {
      reject(`sign_with_ecdsa request sent with ${message.cycles} cycles, but ${SIGN_WITH_ECDSA_FEE} cycles are required.`)
    }
    message.acceptCycles(SIGN_WITH_ECDSA_FEE)
    const privateKey = this.deriveKey(key_id.name, message.caller, derivation_path)
    const signature = await Secp256k1.createSignature(message_hash, privateKey)
    return { signature: concatBytes(signature.r(32), signature.s(32)) }
  }

  async ecdsaPublicKey (
    { canister_id, derivation_path, key_id }: EcdsaPublicKeyArgs, message: IncomingMessage
  ) {
    this.requireKey(key_id.name)
    const privateKey = this.deriveKey(key_id.name, canister_id[0] ?? message.caller, derivation_path)
    const { pubkey } = await Secp256k1.makeKeypair(privateKey)
    return {
      public_key: Secp256k1.compressPubkey(pubkey),
      chain_code: sha256(concatBytes(privateKey, utf8ToBytes('chain code')))
    }
  }

  private requireKey (name: string) {
    if (!ECDSA_KEY_NAMES.includes(name)) {
      reject(`Requested unknown threshold key: ecdsa:Secp256k1:${name}`)
    }
  }

  private deriveKey (keyName: string, owner: Principal, path: Uint8Array[]): Uint8Array {
    const parts = [utf8ToBytes(this.seed), utf8ToBytes(keyName), owner.toUint8Array(), ...path]
    return sha256(concatBytes(...parts.map(lengthPrefixed)))
  }
}

function lengthPrefixed (bytes: Uint8Array): Uint8Array {
  const prefix = new Uint8Array(4)
  new DataView(prefix.buffer).setUint32(0, bytes.length)
  return concatBytes(prefix, bytes)
}

/** Management canister module for a replica with the given seed. */
export const Management = (seed: string) =>
  defineCanister('management', z.unknown(), ic => new ManagementCanister(ic, seed))

/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import { z } from 'zod'
import { blobSchema, principalSchema } from './account'

/* Threshold ECDSA interface of the management canister (`aaaaa-aa`). */

/** Cycles charged for one threshold signature. */
export const SIGN_WITH_ECDSA_FEE = 10_000_000_000n

/** Threshold keys known to the replica. */
export const ECDSA_KEY_NAMES = ['dfx_test_key', 'test_key_1', 'key_1']

export const ecdsaKeyIdSchema = z.object({
  curve: z.object({ secp256k1: z.null() }),
  name:  z.string(),
})

export const signWithEcdsaArgsSchema = z.object({
  message_hash:    blobSchema,
  derivation_path: z.array(blobSchema),
  key_id:          ecdsaKeyIdSchema,
})

export const signWithEcdsaReplySchema = z.object({
  signature: blobSchema
})

export const ecdsaPublicKeyArgsSchema = z.object({
  canister_id:     z.union([z.tuple([]), z.tuple([principalSchema])]),
  derivation_path: z.array(blobSchema),
  key_id:          ecdsaKeyIdSchema,
})

export const ecdsaPublicKeyReplySchema = z.object({
  public_key: blobSchema,
  chain_code: blobSchema,
})

export type SignWithEcdsaArgs = z.infer<typeof signWithEcdsaArgsSchema>

export type EcdsaPublicKeyArgs = z.infer<typeof ecdsaPublicKeyArgsSchema>

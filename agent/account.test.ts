/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import assert from 'node:assert'
import {
  AccountIdentifier, Subaccount, accountIdentifierOf, accountOf, accountSchema
} from './account'
import { canisterIdFromIndex } from './identity'

import { Suite } from '@hackbg/ensuite'
export default new Suite([
  ['builds subaccounts',          testSubaccounts],
  ['derives account identifiers', testAccountIdentifier],
  ['verifies the checksum',       testChecksum],
  ['addresses ICRC-1 accounts',   testIcrc1Accounts],
])

export async function testSubaccounts () {
  assert.ok(Subaccount.ZERO.isZero())
  assert.equal(Subaccount.ZERO.toHex(), '00'.repeat(32))
  assert.equal(Subaccount.fromIndex(258).toHex(), '00'.repeat(30) + '0102')
  assert.ok(!Subaccount.fromIndex(1).isZero())
  const fromPrincipal = Subaccount.fromPrincipal(canisterIdFromIndex(1))
  assert.equal(fromPrincipal.toHex(), '0a' + '00000000000000010101' + '00'.repeat(21))
  assert.throws(()=>Subaccount.fromBytes(new Uint8Array(31)), /Subaccount must be 32 bytes long, got 31/)
}

export async function testAccountIdentifier () {
  const owner = canisterIdFromIndex(0)
  const account = AccountIdentifier.fromPrincipal(owner)
  assert.equal(account.bytes.length, 32)
  assert.equal(account.hash.length, 28)
  assert.match(account.toHex(), /^[0-9a-f]{64}$/)
  assert.equal(String(account), account.toHex())
  assert.ok(account.equals(AccountIdentifier.fromPrincipal(owner, Subaccount.ZERO)))
  assert.ok(account.equals(AccountIdentifier.fromPrincipal(owner, new Uint8Array(32))))
  assert.ok(!account.equals(AccountIdentifier.fromPrincipal(owner, Subaccount.fromIndex(1))))
  assert.ok(!account.equals(AccountIdentifier.fromPrincipal(canisterIdFromIndex(1))))
  assert.ok(account.equals(AccountIdentifier.fromHex(account.toHex().toUpperCase())))
}

export async function testChecksum () {
  const hex = AccountIdentifier.fromPrincipal(canisterIdFromIndex(0)).toHex()
  const flipped = hex.slice(0, 63) + ((hex[63] === '0') ? '1' : '0')
  assert.throws(()=>AccountIdentifier.fromHex(flipped), /checksum mismatch \(expected [0-9a-f]{8}, found [0-9a-f]{8}\)/)
  assert.throws(()=>AccountIdentifier.fromHex('abc'), /expected 64 hex digits, got "abc"/)
  assert.throws(()=>AccountIdentifier.fromBytes(new Uint8Array(31)), /expected 32 bytes, got 31/)
}

export async function testIcrc1Accounts () {
  const owner = canisterIdFromIndex(3)
  const plain = accountOf(owner)
  assert.deepEqual(plain.subaccount, [])
  assert.ok(accountIdentifierOf(plain).equals(AccountIdentifier.fromPrincipal(owner)))
  const sub = Subaccount.fromIndex(7).bytes
  const withSub = accountOf(owner, sub)
  assert.ok(accountIdentifierOf(withSub).equals(AccountIdentifier.fromPrincipal(owner, sub)))
  assert.ok(accountSchema.safeParse(withSub).success)
  assert.ok(!accountSchema.safeParse({ owner: owner.toText(), subaccount: [] }).success)
}

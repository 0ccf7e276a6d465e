/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import assert from 'node:assert'
import { z } from 'zod'
import { AccountIdentifier, accountOf } from '../agent/account'
import { Canister, defineCanister, noArgs } from '../agent/canister'
import type { CanisterContext } from '../agent/canister'
import { Connection } from '../agent/connec'
import { Identity, parsePrincipal } from '../agent/identity'
import { genesis } from '../fixtures/fixtures'
import { Mocknet } from '../mocknet/mocknet'
import {
  Backend, BackendCanister, BackendClient, DEFAULT_OWNER, ICP_LEDGER_CANISTER_ID, XRC_CANISTER_ID
} from './backend'
import { Ledger, LedgerClient } from './ledger'
import { Xrc, XRC_FEE, crypto, fiat } from './xrc'

const INITIAL = 1_000_000_000_000n

async function deploy (backendCycles?: bigint) {
  const mocknet = new Mocknet({ now: genesis })
  const owner  = await Identity.fromSeed('owner')
  const minter = await Identity.fromSeed('minter')
  const bob    = await Identity.fromSeed('bob')
  const ledgerId  = mocknet.createCanister({ specifiedId: parsePrincipal(ICP_LEDGER_CANISTER_ID) })
  const backendId = mocknet.createCanister({ cycles: backendCycles })
  const xrcId     = mocknet.createCanister()
  mocknet.install(ledgerId, Ledger, { Init: {
    minting_account: AccountIdentifier.fromPrincipal(minter.principal).toHex(),
    initial_values:  [[AccountIdentifier.fromPrincipal(backendId).toHex(), { e8s: INITIAL }]],
    send_whitelist:  [],
    transfer_fee:    [{ e8s: 10_000n }],
    token_symbol:    ['LICP'],
    token_name:      ['Local ICP'],
  } })
  mocknet.install(xrcId, Xrc, { rates: [[crypto('ICP'), 12_500_000_000n], [fiat('EUR'), 1_100_000_000n]] })
  mocknet.install(backendId, Backend, { owner: owner.principal, ledger: ledgerId, xrc: xrcId })
  const backend = (identity?: Identity) =>
    new Connection({ endpoint: mocknet, identity }).getCanister(backendId, BackendClient)
  const ledger = new Connection({ endpoint: mocknet }).getCanister(ledgerId, LedgerClient)
  return { mocknet, owner, bob, ledgerId, backendId, xrcId, backend, ledger }
}

import { Suite } from '@hackbg/ensuite'
export default new Suite([
  ['lets only the owner transfer ICP',         testOwner],
  ['transfers ICP',                            testIcpTransfer],
  ['reports ledger failures of ICP transfers', testIcpTransferFailures],
  ['queries the ledger with retries',          testQueries],
  ['transfers with ICRC-1 and retries safely', testIcrc1Transfer],
  ['reports replies that fail to decode',      testMalformedReplies],
  ['gets exchange rates',                      testExchangeRate],
  ['defaults to the well-known canisters',     testDefaults],
])

export async function testOwner () {
  const { bob, backend } = await deploy()
  const to = AccountIdentifier.fromPrincipal(bob.principal).bytes
  assert.deepEqual(await backend(bob).icpTransfer(to, { e8s: 1n }),
    { Err: 'Only the owner can ask to transfer ICP' })
  assert.deepEqual(await backend().icpTransfer(to, { e8s: 1n }),
    { Err: 'Only the owner can ask to transfer ICP' })
}

export async function testIcpTransfer () {
  const { owner, bob, backendId, backend, ledger } = await deploy()
  const bobAccount = AccountIdentifier.fromPrincipal(bob.principal)
  assert.deepEqual(await backend(owner).icpTransfer(bobAccount.bytes, { e8s: 1_000n }), { Ok: null })
  assert.deepEqual(await ledger.accountBalance(bobAccount), { e8s: 1_000n })
  assert.deepEqual(await ledger.accountBalance(AccountIdentifier.fromPrincipal(backendId)),
    { e8s: INITIAL - 11_000n })
}

export async function testIcpTransferFailures () {
  const { mocknet, owner, bob, ledgerId, backend } = await deploy()
  const to = AccountIdentifier.fromPrincipal(bob.principal).bytes
  assert.deepEqual(await backend(owner).icpTransfer(to, { e8s: 2n * INITIAL }), {
    Err: 'Ledger returned an error: InsufficientFunds { balance: { e8s: 1000000000000 } }'
  })
  mocknet.inject({ kind: 'CanisterReject', callee: ledgerId, message: 'stopping' })
  assert.deepEqual(await backend(owner).icpTransfer(to, { e8s: 1n }), {
    Err: 'Error calling ledger canister: CanisterReject: stopping'
  })
  mocknet.inject({ kind: 'Trap', callee: ledgerId, message: 'out of memory' })
  await assert.rejects(()=>backend(owner).icpTransfer(to, { e8s: 1n }),
    /Ledger crashed: Canister ryjl3-tyaaa-aaaaa-aaaba-cai trapped: out of memory/)
}

export async function testQueries () {
  const { mocknet, ledgerId, backendId, xrcId, backend } = await deploy()
  assert.deepEqual(await backend().icrc1GetBalance(backendId), { Ok: INITIAL })
  assert.deepEqual(await backend().icrc1GetFee(ledgerId), { Ok: 10_000n })
  mocknet.inject({ kind: 'SysUnknown', callee: ledgerId, times: 2 })
  mocknet.inject({ kind: 'SysTransient', callee: ledgerId, times: 2 })
  assert.deepEqual(await backend().icrc1GetFee(ledgerId), { Ok: 10_000n })
  mocknet.inject({ kind: 'SysTransient', callee: ledgerId, sync: true })
  assert.deepEqual(await backend().icrc1GetFee(ledgerId), {
    Err: 'Irrecoverable error: SysTransient (sync): injected SysTransient'
  })
  mocknet.inject({ kind: 'Trap', callee: ledgerId })
  assert.deepEqual(await backend().icrc1GetFee(ledgerId), {
    Err: 'Ledger crashed: Canister ryjl3-tyaaa-aaaaa-aaaba-cai trapped: injected Trap'
  })
  // The XRC has no `icrc1_fee`.
  assert.deepEqual(await backend().icrc1GetFee(xrcId), {
    Err: `Ledger crashed: Canister ${xrcId.toText()} has no update method 'icrc1_fee'`
  })
  mocknet.inject({ kind: 'SysUnknown', callee: ledgerId, times: 1000, delay: 60 })
  assert.deepEqual(await backend().icrc1GetBalance(backendId), { Err: 'Timed out while waiting for the balance' })
}

export async function testIcrc1Transfer () {
  const { mocknet, bob, ledgerId, backendId, backend, ledger } = await deploy()
  const to = accountOf(bob.principal)
  assert.deepEqual(await backend().icrc1Transfer(ledgerId, to, 5_000n), { Ok: null })
  assert.equal(await ledger.icrc1BalanceOf(to), 5_000n)
  // The first reply is lost after the transfer went through; the retry is deduplicated.
  mocknet.inject({ kind: 'SysUnknown', callee: ledgerId, method: 'icrc1_transfer', executed: true })
  assert.deepEqual(await backend().icrc1Transfer(ledgerId, to, 5_000n), { Ok: null })
  assert.equal(await ledger.icrc1BalanceOf(to), 10_000n)
  assert.equal(await ledger.icrc1BalanceOf(accountOf(backendId)), INITIAL - 30_000n)
  assert.deepEqual(await backend().icrc1Transfer(ledgerId, to, 2n * INITIAL), {
    Err: `Ledger returned an error: InsufficientFunds { balance: ${INITIAL - 30_000n} }`
  })
  mocknet.inject({ kind: 'CanisterReject', callee: ledgerId, method: 'icrc1_fee', message: 'no' })
  assert.deepEqual(await backend().icrc1Transfer(ledgerId, to, 1n), {
    Err: 'Error obtaining the fee from the ledger canister: Irrecoverable error: CanisterReject: no'
  })
}

/** Answers the ledger methods with the wrong types. */
class MalformedLedgerCanister extends Canister {
  constructor (ic: CanisterContext) {
    super(ic)
    this.update('transfer', z.tuple([z.unknown()]), () => 'sent')
    this.update('icrc1_fee', noArgs, () => 'free')
  }
}

const MalformedLedger = defineCanister('malformed_ledger', z.unknown(), ic => new MalformedLedgerCanister(ic))

export async function testMalformedReplies () {
  const mocknet = new Mocknet({ now: genesis })
  const owner = await Identity.fromSeed('owner')
  const ledgerId = mocknet.createCanister()
  const backendId = mocknet.createCanister()
  mocknet.install(ledgerId, MalformedLedger, null)
  mocknet.install(backendId, Backend, { owner: owner.principal, ledger: ledgerId, xrc: ledgerId })
  const backend = (identity?: Identity) =>
    new Connection({ endpoint: mocknet, identity }).getCanister(backendId, BackendClient)
  await assert.rejects(()=>backend(owner).icpTransfer(new Uint8Array(32), { e8s: 1n }),
    new RegExp(`Canister ${backendId.toText()} trapped: Decoding failed: `))
  const fee = await backend().icrc1GetFee(ledgerId)
  assert.ok('Err' in fee && fee.Err.startsWith('Unable to decode the fee: '), JSON.stringify(fee))
  assert.deepEqual(await backend().icrc1Transfer(ledgerId, accountOf(owner.principal), 1n), {
    Err: `Error obtaining the fee from the ledger canister: ${'Err' in fee ? fee.Err : ''}`
  })
}

export async function testExchangeRate () {
  const { backendId, backend, mocknet } = await deploy()
  assert.deepEqual(await backend().getExchangeRate(crypto('ICP'), fiat('USD')), { Ok: [12_500_000_000n, 9] })
  assert.deepEqual(await backend().getExchangeRate(crypto('ICP'), fiat('EUR')), { Ok: [11_363_636_363n, 9] })
  assert.equal(await mocknet.getCyclesBalance(backendId), Mocknet.INITIAL_CYCLES - 2n * XRC_FEE)
  assert.deepEqual(await backend().getExchangeRate(crypto('XYZ'), fiat('USD')),
    { Err: 'XRC returned an error: CryptoBaseAssetNotFound' })
  assert.deepEqual(await backend().getExchangeRate(crypto('ICP'), fiat('JPY')),
    { Err: 'XRC returned an error: ForexQuoteAssetNotFound' })
  const poor = await deploy(10n)
  assert.deepEqual(await poor.backend().getExchangeRate(crypto('ICP'), fiat('USD')), {
    Err: `Error calling XRC: SysTransient (sync): Canister ${poor.backendId.toText()} can't attach 1000000000 cycles: balance is 10`
  })
}

export async function testDefaults () {
  const mocknet = new Mocknet({ now: genesis })
  const id = mocknet.createCanister()
  const program = mocknet.install(id, Backend, undefined)
  assert.ok(program instanceof BackendCanister)
  assert.equal(program.options.owner.toText(), DEFAULT_OWNER)
  assert.equal(program.options.ledger.toText(), ICP_LEDGER_CANISTER_ID)
  assert.equal(program.options.xrc.toText(), XRC_CANISTER_ID)
  const client = new Connection({ endpoint: mocknet }).getCanister(id, BackendClient)
  assert.deepEqual(await client.icpTransfer(new Uint8Array(32), { e8s: 1n }),
    { Err: 'Only the owner can ask to transfer ICP' })
}

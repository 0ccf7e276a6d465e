/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import assert from 'node:assert'
import { join } from 'node:path'
import { AccountIdentifier } from '../agent/account'
import { Console } from '../agent/base'
import { render } from '../agent/candid'
import { Identity, canisterIdFromIndex, parsePrincipal } from '../agent/identity'
import { BackendCanister } from '../canisters/backend'
import { LedgerCanister, LedgerClient } from '../canisters/ledger'
import { DfxDevnet, LEDGER_SCRIPT_NAME } from '../devnet/dfx'
import { MocknetDevnet } from '../devnet/mocknet'
import DevnetError from '../devnet/DevnetError'
import { RecordingShell, fakeFetch, genesis, tmpDir } from '../fixtures/fixtures'
import { backendInitArgument, ledgerInitArgument, setup } from './setup'

const log = new Console('setup test')

import { Suite } from '@hackbg/ensuite'
export default new Suite([
  ['renders the ledger install argument',               testLedgerInitArgument],
  ['provisions a dfx project',                          testDfxSetup],
  ['stops before anything runs when a tool is missing', testMissingTool],
  ['provisions the mocknet',                            testMocknetSetup],
])

export async function testLedgerInitArgument () {
  const minting = AccountIdentifier.fromPrincipal(canisterIdFromIndex(0))
  const backend = AccountIdentifier.fromPrincipal(canisterIdFromIndex(1))
  assert.equal(render(ledgerInitArgument({
    mintingAccount: minting,
    initialValues:  [[backend, { e8s: 1_000_000_000_000n }]],
  })), 'variant { Init = record { ' +
    'send_whitelist = vec {}; ' +
    'token_symbol = opt "LICP"; ' +
    'transfer_fee = opt record { e8s = 10_000 : nat64; }; ' +
    `minting_account = "${minting.toHex()}"; ` +
    `initial_values = vec { record { "${backend.toHex()}"; record { e8s = 1_000_000_000_000 : nat64; }; }; }; ` +
    'token_name = opt "Local ICP"; ' +
    '} }')
}

export async function testDfxSetup () {
  const projectRoot = await tmpDir()
  const script  = join(projectRoot, LEDGER_SCRIPT_NAME)
  const minting = AccountIdentifier.fromPrincipal((await Identity.fromSeed('developer')).principal)
  const backend = AccountIdentifier.fromPrincipal(canisterIdFromIndex(1))
  const shell = new RecordingShell(undefined, {
    'dfx ledger account-id': { stdout: `${minting.toHex()}\n` },
    'dfx canister id backend': { stdout: 'rrkah-fqaaa-aaaaa-aaaaq-cai\n' },
    'dfx ledger account-id --of-principal rrkah-fqaaa-aaaaa-aaaaq-cai': { stdout: `${backend.toHex()}\n` },
  })
  const devnet = new DfxDevnet({ shell, projectRoot, fetch: fakeFetch('#!/bin/sh\n').fetch })
  const receipt = await setup({ devnet, log })
  assert.deepEqual(shell.checked, ['jq', 'dfx'])
  assert.deepEqual(shell.lines, [
    'dfx stop',
    'dfx start --clean --background',
    'dfx canister create --specified-id ryjl3-tyaaa-aaaaa-aaaba-cai icp_ledger_canister',
    'dfx canister create backend',
    'dfx build icp_ledger_canister',
    script,
    'dfx ledger account-id',
    'dfx canister id backend',
    'dfx ledger account-id --of-principal rrkah-fqaaa-aaaaa-aaaaq-cai',
    'dfx canister install icp_ledger_canister -m install --argument (variant { Init = record { ' +
      'send_whitelist = vec {}; token_symbol = opt "LICP"; ' +
      'transfer_fee = opt record { e8s = 10_000 : nat64; }; ' +
      `minting_account = "${minting.toHex()}"; ` +
      `initial_values = vec { record { "${backend.toHex()}"; record { e8s = 1_000_000_000_000 : nat64; }; }; }; ` +
      'token_name = opt "Local ICP"; } })',
  ])
  assert.equal(receipt.ledger.toText(), 'ryjl3-tyaaa-aaaaa-aaaba-cai')
  assert.equal(receipt.backend.toText(), 'rrkah-fqaaa-aaaaa-aaaaq-cai')
  assert.ok(receipt.mintingAccount.equals(minting))
  assert.ok(receipt.backendAccount.equals(backend))
}

export async function testMissingTool () {
  const shell = new RecordingShell(['jq'])
  await assert.rejects(()=>setup({ devnet: new DfxDevnet({ shell }), log }), DevnetError.MissingTool)
  assert.deepEqual(shell.runs, [])
}

export async function testMocknetSetup () {
  const identity = await Identity.fromSeed('developer')
  const devnet = new MocknetDevnet({ identity, genesis })
  const owner = (await Identity.fromSeed('owner')).principal
  const ledgerId = parsePrincipal('ryjl3-tyaaa-aaaaa-aaaba-cai')
  const receipt = await setup({
    devnet,
    log,
    backendInit: backendInitArgument({ owner, ledger: ledgerId, xrc: canisterIdFromIndex(9) })
  })
  assert.ok(receipt.mintingAccount.equals(AccountIdentifier.fromPrincipal(identity.principal)))
  assert.equal(receipt.backend.toText(), canisterIdFromIndex(0).toText())
  const ledger = (await devnet.connect()).getCanister(receipt.ledger, LedgerClient)
  assert.deepEqual(await ledger.accountBalance(receipt.backendAccount), { e8s: 1_000_000_000_000n })
  assert.deepEqual(await ledger.transferFee(), { e8s: 10_000n })
  assert.equal(await ledger.icrc1Symbol(), 'LICP')
  const mocknet = devnet.getMocknet()
  const ledgerProgram = mocknet.getCanister(receipt.ledger).program
  assert.ok(ledgerProgram instanceof LedgerCanister)
  assert.equal(ledgerProgram.blocks.length, 1)
  const backendProgram = mocknet.getCanister(receipt.backend).program
  assert.ok(backendProgram instanceof BackendCanister)
  assert.equal(backendProgram.options.owner.toText(), owner.toText())
  assert.equal(backendProgram.options.xrc.toText(), canisterIdFromIndex(9).toText())
  // Running it again starts over.
  await setup({ devnet, log })
  assert.notEqual(devnet.getMocknet(), mocknet)
  assert.equal(devnet.getMocknet().getCanister(receipt.backend).program, undefined)
}

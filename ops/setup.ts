/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import type { Principal } from '@dfinity/principal'
import { Console, bold } from '../agent/base'
import type { AccountIdentifier } from '../agent/account'
import { Candid } from '../agent/candid'
import { parsePrincipal } from '../agent/identity'
import { DEFAULT_TRANSFER_FEE, formatTokens } from '../agent/token'
import type { Tokens } from '../agent/token'
import { ICP_LEDGER_CANISTER_ID } from '../canisters/backend'
import type { Devnet } from '../devnet/devnet'

/** Balance the backend canister starts with on a local ledger. */
export const INITIAL_BACKEND_BALANCE: Tokens = { e8s: 1_000_000_000_000n }

export interface LedgerInitOptions {
  mintingAccount: AccountIdentifier
  initialValues:  Array<[AccountIdentifier, Tokens]>
  transferFee?:   Tokens
  tokenSymbol?:   string
  tokenName?:     string
}

/** Install argument of the ICP ledger. */
export function ledgerInitArgument ({
  mintingAccount,
  initialValues,
  transferFee = DEFAULT_TRANSFER_FEE,
  tokenSymbol = 'LICP',
  tokenName   = 'Local ICP',
}: LedgerInitOptions): Candid {
  return Candid.variant('Init', Candid.record({
    send_whitelist:  Candid.vec(),
    token_symbol:    Candid.some(Candid.text(tokenSymbol)),
    transfer_fee:    Candid.some(Candid.record({ e8s: Candid.nat64(transferFee.e8s) })),
    minting_account: Candid.text(mintingAccount.toHex()),
    initial_values:  Candid.vec(...initialValues.map(([account, { e8s }])=>Candid.tuple(
      Candid.text(account.toHex()),
      Candid.record({ e8s: Candid.nat64(e8s) })
    ))),
    token_name:      Candid.some(Candid.text(tokenName)),
  }))
}

/** Install argument of the backend canister. */
export function backendInitArgument ({ owner, ledger, xrc }: {
  owner: Principal, ledger: Principal, xrc: Principal
}): Candid {
  return Candid.record({
    owner:  Candid.principal(owner),
    ledger: Candid.principal(ledger),
    xrc:    Candid.principal(xrc),
  })
}

export interface SetupOptions {
  devnet:           Devnet
  /** Name of the ledger canister in the project. */
  ledgerCanister?:  string
  /** Name of the canister that receives the initial balance. */
  backendCanister?: string
  /** Fixed id of the ledger canister. */
  ledgerId?:        Principal
  initialBalance?:  Tokens
  transferFee?:     Tokens
  /** Also install the backend canister with this argument. */
  backendInit?:     Candid
  log?:             Console
}

export interface SetupReceipt {
  ledger:         Principal
  backend:        Principal
  mintingAccount: AccountIdentifier
  backendAccount: AccountIdentifier
}

/** Start a clean devnet with an ICP ledger that credits the backend canister's account. */
export async function setup ({
  devnet,
  ledgerCanister  = 'icp_ledger_canister',
  backendCanister = 'backend',
  ledgerId        = parsePrincipal(ICP_LEDGER_CANISTER_ID),
  initialBalance  = INITIAL_BACKEND_BALANCE,
  transferFee     = DEFAULT_TRANSFER_FEE,
  backendInit,
  log             = new Console('setup'),
}: SetupOptions): Promise<SetupReceipt> {
  await devnet.requireTools()
  await devnet.stop()
  await devnet.start({ clean: true, background: true })
  await devnet.createCanister(ledgerCanister, { specifiedId: ledgerId })
  await devnet.createCanister(backendCanister)
  await devnet.fetchLedger(ledgerCanister)
  const mintingAccount = await devnet.accountId()
  const backend        = await devnet.canisterId(backendCanister)
  const backendAccount = await devnet.accountId(backend)
  await devnet.install(ledgerCanister, ledgerInitArgument({
    mintingAccount,
    initialValues: [[backendAccount, initialBalance]],
    transferFee,
  }), 'install')
  log.info(`Installed ${bold(ledgerCanister)} at ${bold(ledgerId.toText())}`)
  if (backendInit) {
    await devnet.build(backendCanister)
    await devnet.install(backendCanister, backendInit, 'install')
    log.info(`Installed ${bold(backendCanister)} at ${bold(backend.toText())}`)
  }
  log.balances([
    ['minting account', mintingAccount.toHex()],
    [`${backendCanister} account`, backendAccount.toHex()],
    [`${backendCanister} balance`, `${formatTokens(initialBalance)} LICP`],
  ])
  return { ledger: ledgerId, backend, mintingAccount, backendAccount }
}

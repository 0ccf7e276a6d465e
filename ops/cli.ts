/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import { resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { CommandContext } from '@hackbg/cmds'
import { Console, Error as IccError, bold } from '../agent/base'
import { parsePrincipal } from '../agent/identity'
import { IccConfig } from '../config'
import type { Devnet } from '../devnet/devnet'
import { DfxDevnet } from '../devnet/dfx'
import { MocknetDevnet } from '../devnet/mocknet'
import { backendInitArgument, setup } from './setup'

const log = new Console('icc')

/** Create the devnet selected by the configuration. */
export function getDevnet (config: IccConfig, log?: Console): Devnet {
  switch (config.devnet.platform) {
    case 'mocknet':
      return new MocknetDevnet({ log })
    case 'dfx':
      return new DfxDevnet({
        dfx:             config.devnet.dfx,
        projectRoot:     config.project.root,
        ledgerScriptUrl: config.devnet.ledgerScriptUrl,
        log,
      })
  }
}

export default class IccCommands extends CommandContext {

  constructor (
    readonly config: IccConfig = new IccConfig(),
    readonly devnet: Devnet = getDevnet(config),
  ) {
    super('icc')
    this.commands('devnet', 'manage the devnet', new DevnetCommands(devnet))
  }

  setup = this.command('setup', 'start a clean devnet with a local ICP ledger', () => {
    const { config, devnet } = this
    return setup({
      devnet,
      ledgerCanister:  config.canisters.ledgerName,
      backendCanister: config.canisters.backendName,
      ledgerId:        parsePrincipal(config.canisters.ledgerId),
      // There is no `dfx deploy` on the mocknet, so the backend is installed here.
      backendInit:     (devnet instanceof MocknetDevnet) ? backendInitArgument({
        owner:  parsePrincipal(config.canisters.owner),
        ledger: parsePrincipal(config.canisters.ledgerId),
        xrc:    parsePrincipal(config.canisters.xrcId),
      }) : undefined,
      log,
    })
  })

  accountId = this.command('account-id',
    'print the ledger account of a principal, or of the current identity',
    async (principal?: string) => {
      const account = await this.devnet.accountId(principal ? parsePrincipal(principal) : undefined)
      log.info(account.toHex())
    })

}

export class DevnetCommands extends CommandContext {

  constructor (readonly devnet: Devnet) {
    super('icc devnet')
  }

  start = this.command('start', 'start the devnet in the background', async () => {
    await this.devnet.requireTools()
    await this.devnet.start({ clean: false, background: true })
    log.info(`Started ${bold(this.devnet.platform)} devnet`)
  })

  stop = this.command('stop', 'stop the devnet', async () => {
    await this.devnet.stop()
    log.info(`Stopped ${bold(this.devnet.platform)} devnet`)
  })

}

/** Run a command. Expected failures are printed and exit with 1. */
export async function main (commands: CommandContext, args: string[]): Promise<number> {
  try {
    await commands.run(args)
    return 0
  } catch (e) {
    if (e instanceof IccError) {
      log.error(e.message)
      return 1
    }
    throw e
  }
}

if (process.argv[1] && resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main(new IccCommands(), process.argv.slice(2)).then(
    code => { process.exitCode = code },
    error => {
      log.error(error)
      process.exitCode = 1
    }
  )
}

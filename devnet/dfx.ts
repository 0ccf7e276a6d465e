/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import { chmod, writeFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import type { Principal } from '@dfinity/principal'
import { bold } from '../agent/base'
import type { Console, Name } from '../agent/base'
import { AccountIdentifier } from '../agent/account'
import { renderArgs } from '../agent/candid'
import type { Candid } from '../agent/candid'
import { parsePrincipal } from '../agent/identity'
import type { InstallMode } from '../mocknet/mocknet'
import { DFX, Devnet, JQ } from './devnet'
import type { StartOptions } from './devnet'
import DevnetError from './DevnetError'
import { ProcessShell } from './shell'
import type { RunOptions, Shell } from './shell'

/** Pinned script that downloads the ICP ledger's Wasm and interface. */
export const LEDGER_SCRIPT_URL =
  'https://raw.githubusercontent.com/dfinity/ic/aba60ffbc46acfc8990bf4d5685c1360bd7026b9/rs/rosetta-api/scripts/download_latest_icp_ledger.sh'

export const LEDGER_SCRIPT_NAME = 'download_latest_icp_ledger.sh'

/** A local replica managed with `dfx`, in a dfx project directory. */
export class DfxDevnet extends Devnet {
  readonly platform = 'dfx'
  requiredTools = [JQ, DFX]
  /** The `dfx` executable. */
  dfx:             string
  /** Directory containing `dfx.json`. */
  projectRoot:     string
  ledgerScriptUrl: string
  shell:           Shell
  fetch:           (url: string) => Promise<Response>

  constructor (properties: {
    dfx?:             string
    projectRoot?:     string
    ledgerScriptUrl?: string
    shell?:           Shell
    fetch?:           (url: string) => Promise<Response>
    log?:             Console
  } = {}) {
    super(properties)
    this.dfx             = properties.dfx ?? 'dfx'
    this.projectRoot     = properties.projectRoot ?? process.cwd()
    this.ledgerScriptUrl = properties.ledgerScriptUrl ?? LEDGER_SCRIPT_URL
    this.shell           = properties.shell ?? new ProcessShell()
    this.fetch           = properties.fetch ?? (url => globalThis.fetch(url))
  }

  protected hasTool (name: string): Promise<boolean> {
    return this.shell.has((name === DFX.name) ? this.dfx : name)
  }

  async stop (): Promise<this> {
    const { code, stderr } = await this.shell.run(this.dfx, ['stop'], { cwd: this.projectRoot })
    if (code !== 0) {
      this.log.warn(`dfx stop exited with ${code}, continuing:`, stderr.trim())
    }
    this.running = false
    return this
  }

  async start ({ clean = true, background = true }: StartOptions = {}): Promise<this> {
    await this.run([
      'start',
      ...clean ? ['--clean'] : [],
      ...background ? ['--background'] : [],
    ], { detached: true })
    this.running = true
    return this
  }

  async createCanister (name: Name, { specifiedId }: { specifiedId?: Principal } = {}): Promise<void> {
    await this.run([
      'canister', 'create',
      ...specifiedId ? ['--specified-id', specifiedId.toText()] : [],
      name
    ])
  }

  async canisterId (name: Name): Promise<Principal> {
    return parsePrincipal(await this.run(['canister', 'id', name]))
  }

  async build (name: Name): Promise<void> {
    await this.run(['build', name])
  }

  /** Download the pinned ledger script, build the ledger canister, then run the script. */
  async fetchLedger (name: Name): Promise<void> {
    const script = resolve(this.projectRoot, LEDGER_SCRIPT_NAME)
    this.log.log(`Downloading ${bold(this.ledgerScriptUrl)}`)
    const response = await this.fetch(this.ledgerScriptUrl)
    if (!response.ok) {
      throw new DevnetError.DownloadFailed(this.ledgerScriptUrl, response.status)
    }
    await writeFile(script, await response.text())
    await chmod(script, 0o755)
    await this.build(name)
    const { code, stderr } = await this.shell.run(script, [], { cwd: this.projectRoot })
    if (code !== 0) {
      throw new DevnetError.CommandFailed(script, code, stderr.trim())
    }
  }

  async accountId (ofPrincipal?: Principal): Promise<AccountIdentifier> {
    return AccountIdentifier.fromHex(await this.run([
      'ledger', 'account-id',
      ...ofPrincipal ? ['--of-principal', ofPrincipal.toText()] : []
    ]))
  }

  async install (name: Name, argument: Candid, mode: InstallMode = 'install'): Promise<void> {
    await this.run(['canister', 'install', name, '-m', mode, '--argument', renderArgs([argument])])
  }

  /** Run dfx in the project directory, failing on a non-zero exit code. Returns trimmed stdout. */
  private async run (args: string[], options: RunOptions = {}): Promise<string> {
    const { code, stdout, stderr } = await this.shell.run(this.dfx, args, { cwd: this.projectRoot, ...options })
    if (code !== 0) {
      throw new DevnetError.CommandFailed(`${this.dfx} ${args.join(' ')}`, code, stderr.trim())
    }
    return stdout.trim()
  }
}

/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import { spawn } from 'node:child_process'
import { Logged, bold } from '../agent/base'

export interface ShellResult {
  code:   number
  stdout: string
  stderr: string
}

export interface RunOptions {
  cwd?:      string
  /** Don't capture output; resolve as soon as the process exits.
    * Needed for commands that leave a daemon holding the pipes. */
  detached?: boolean
}

/** Runs external programs. */
export interface Shell {
  run (command: string, args: string[], options?: RunOptions): Promise<ShellResult>
  /** Whether a command is available on the PATH. */
  has (command: string): Promise<boolean>
}

export class ProcessShell extends Logged implements Shell {

  run (command: string, args: string[], { cwd, detached = false }: RunOptions = {}): Promise<ShellResult> {
    this.log.debug('$', bold(command), ...args)
    return new Promise((resolve, reject) => {
      if (detached) {
        const child = spawn(command, args, { cwd, stdio: 'ignore' })
        child.on('error', reject)
        child.on('exit', code => resolve({ code: code ?? 1, stdout: '', stderr: '' }))
        return
      }
      const child = spawn(command, args, { cwd, stdio: ['ignore', 'pipe', 'pipe'] })
      let stdout = ''
      let stderr = ''
      child.stdout.on('data', (chunk: Buffer) => { stdout += chunk.toString() })
      child.stderr.on('data', (chunk: Buffer) => { stderr += chunk.toString() })
      child.on('error', reject)
      child.on('close', code => resolve({ code: code ?? 1, stdout, stderr }))
    })
  }

  async has (command: string): Promise<boolean> {
    if (!/^[\w./+-]+$/.test(command)) return false
    const { code } = await this.run('sh', ['-c', `command -v ${command}`])
    return code === 0
  }
}

/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import { mkdtemp } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { NANOS_PER_SECOND } from '../agent/base'
import type { Nanos } from '../agent/base'
import type { RunOptions, Shell, ShellResult } from '../devnet/shell'

/** Replica time the tests start at. */
export const genesis: Nanos = 1_700_000_000n * NANOS_PER_SECOND

export const tmpDir = () => mkdtemp(join(tmpdir(), 'icc-test-'))

export interface RecordedRun {
  command: string
  args:    string[]
  options: RunOptions
}

/** Records commands instead of running them. Replies are looked up by the joined command line. */
export class RecordingShell implements Shell {
  runs: RecordedRun[] = []
  checked: string[] = []

  constructor (
    readonly tools: string[] = ['jq', 'dfx'],
    readonly replies: Record<string, Partial<ShellResult>> = {},
  ) {}

  async run (command: string, args: string[], options: RunOptions = {}): Promise<ShellResult> {
    this.runs.push({ command, args, options })
    const reply = this.replies[[command, ...args].join(' ')] ?? {}
    return { code: reply.code ?? 0, stdout: reply.stdout ?? '', stderr: reply.stderr ?? '' }
  }

  async has (command: string): Promise<boolean> {
    this.checked.push(command)
    return this.tools.includes(command)
  }

  /** Command lines that were run, joined with spaces. */
  get lines (): string[] {
    return this.runs.map(({ command, args }) => [command, ...args].join(' '))
  }
}

/** Stand-in for `fetch` that serves a fixed body. */
export function fakeFetch (body: string, status = 200) {
  const urls: string[] = []
  const fetch = async (url: string): Promise<Response> => {
    urls.push(url)
    return new Response(body, { status })
  }
  return { fetch, urls }
}

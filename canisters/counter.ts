/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import { z } from 'zod'
import { Canister, defineCanister, noArgs } from '../agent/canister'
import type { CanisterContext } from '../agent/canister'
import { CanisterClient } from '../agent/connec'
import { natSchema } from '../agent/token'

/** A natural number that can be read and overwritten. */
export class CounterCanister extends Canister {
  value: bigint

  constructor (ic: CanisterContext, initial: bigint) {
    super(ic)
    this.value = initial
    this.query('get', noArgs, () => this.value)
    this.update('set', z.tuple([natSchema]), ([value]) => {
      this.value = value
    })
    this.update('get_and_set', z.tuple([natSchema]), ([value]) => {
      const old = this.value
      this.value = value
      return old
    })
    this.update('inc', noArgs, () => {
      this.value += 1n
    })
    this.update('increment', noArgs, () => {
      this.value += 1n
    })
  }
}

export const Counter = defineCanister('counter',
  natSchema.optional().transform(initial => initial ?? 0n),
  (ic, initial) => new CounterCanister(ic, initial))

export class CounterClient extends CanisterClient {
  get (): Promise<bigint> {
    return this.query('get', [], natSchema)
  }
  async set (value: bigint): Promise<void> {
    await this.update('set', [value], z.null())
  }
  getAndSet (value: bigint): Promise<bigint> {
    return this.update('get_and_set', [value], natSchema)
  }
  async inc (): Promise<void> {
    await this.update('inc', [], z.null())
  }
}

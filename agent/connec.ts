/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import { Principal } from '@dfinity/principal'
import { Error, Logged, bold, timed } from './base'
import type { Console, Cycles, Method, Nanos } from './base'
import { CandidDecodingFailed } from './call'
import type { Decoder } from './call'
import type { MethodKind } from './canister'
import { Identity, parsePrincipal } from './identity'

/** Where a connection sends its messages. */
export abstract class Endpoint extends Logged {
  /** Network id. */
  id?: string
  constructor (properties: { id?: string, log?: Console } = {}) {
    super(properties)
    this.id = properties.id
  }

  /** Current time of the network, in nanoseconds since the epoch. */
  abstract getTime (): Promise<Nanos>

  abstract getCyclesBalance (canisterId: Principal): Promise<Cycles>

  /** Submit a message from a user to a canister and wait for the reply. */
  abstract submit (
    sender: Principal, canisterId: Principal, method: Method, args: unknown[], kind: MethodKind
  ): Promise<unknown>
}

/** An identity talking to an endpoint. */
export class Connection extends Logged {
  /** API endpoint. */
  endpoint?: Endpoint
  /** Signer identity. */
  identity?: Identity

  constructor (properties: { endpoint?: Endpoint, identity?: Identity, log?: Console } = {}) {
    super(properties)
    this.endpoint = properties.endpoint
    this.identity = properties.identity
  }

  /** Principal messages are sent as. */
  get principal (): Principal {
    return this.identity?.principal ?? Principal.anonymous()
  }

  /** Query a canister method. */
  query <T> (canister: Principal|string, method: Method, args: unknown[], decoder: Decoder<T>): Promise<T> {
    return this.submit('query', canister, method, args, decoder)
  }

  /** Call a canister method as an update. */
  update <T> (canister: Principal|string, method: Method, args: unknown[], decoder: Decoder<T>): Promise<T> {
    return this.submit('update', canister, method, args, decoder)
  }

  async getTime (): Promise<Nanos> {
    return await connected(this).getTime()
  }

  async getCyclesBalance (canister: Principal|string): Promise<Cycles> {
    return await connected(this).getCyclesBalance(toPrincipal(canister))
  }

  /** Get a client for a canister. */
  getCanister <C extends CanisterClient> (
    canisterId: Principal|string,
    $C: new (properties: { canisterId: Principal|string, connection?: Connection }) => C
  ): C {
    return new $C({ canisterId, connection: this })
  }

  private async submit <T> (
    kind: MethodKind, canister: Principal|string, method: Method, args: unknown[], decoder: Decoder<T>
  ): Promise<T> {
    const canisterId = toPrincipal(canister)
    const reply = await timed(
      ()=>connected(this).submit(this.principal, canisterId, method, args, kind),
      ({ elapsed }) => this.log.debug(
        `${kind === 'query' ? 'Queried' : 'Called'} in ${bold(elapsed)}:`,
        `${bold(canisterId.toText())}.${bold(method)}`
      )
    )
    const decoded = decoder.safeParse(reply)
    if (!decoded.success) {
      throw new CandidDecodingFailed(decoded.error.issues[0]?.message ?? 'invalid reply', reply)
    }
    return decoded.data
  }
}

function connected ({ endpoint }: { endpoint?: Endpoint }): Endpoint {
  if (!endpoint) {
    throw new Error.NoEndpoint()
  }
  return endpoint
}

function toPrincipal (canister: Principal|string): Principal {
  return (typeof canister === 'string') ? parsePrincipal(canister) : canister
}

/** Interface to the API of a particular canister.
  * Subclass this to add the canister's methods. */
export class CanisterClient extends Logged {
  canisterId: Principal
  connection?: Connection

  constructor (properties: { canisterId: Principal|string, connection?: Connection, log?: Console }) {
    super(properties)
    this.canisterId = toPrincipal(properties.canisterId)
    this.connection = properties.connection
  }

  protected async query <T> (method: Method, args: unknown[], decoder: Decoder<T>): Promise<T> {
    return await this.connected().query(this.canisterId, method, args, decoder)
  }

  protected async update <T> (method: Method, args: unknown[], decoder: Decoder<T>): Promise<T> {
    return await this.connected().update(this.canisterId, method, args, decoder)
  }

  private connected (): Connection {
    if (!this.connection) {
      throw new Error.NoConnection(this.canisterId.toText())
    }
    return this.connection
  }
}

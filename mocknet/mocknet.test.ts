/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import assert from 'node:assert'
import { z } from 'zod'
import { CallRejected, CanisterError, RejectCode, SysUnknown } from '../agent/call'
import { Canister, defineCanister, noArgs } from '../agent/canister'
import type { CanisterContext } from '../agent/canister'
import { Connection } from '../agent/connec'
import { canisterIdFromIndex } from '../agent/identity'
import { Counter } from '../canisters/counter'
import config from '../config'
import { genesis } from '../fixtures/fixtures'
import MocknetConsole from './MocknetConsole'
import { Mocknet } from './mocknet'

import { Suite } from '@hackbg/ensuite'
export default new Suite([
  ['allocates canister ids',                     testCreate],
  ['installs code',                              testInstall],
  ['reports failed messages',                    testFailures],
  ['keeps time',                                 testTime],
  ['routes calls between canisters with faults', testFaults],
  ['times out bounded calls',                    testTimeout],
  ['prints debug output only when asked',        testDebugOutput],
])

/** Takes a lot of replica time to do anything. */
class SlowCanister extends Canister {
  constructor (ic: CanisterContext, mocknet: Mocknet) {
    super(ic)
    this.update('work', noArgs, () => { mocknet.advance(400) })
  }
}

export async function testCreate () {
  const mocknet = new Mocknet({ now: genesis })
  assert.equal(mocknet.createCanister().toText(), 'rwlgt-iiaaa-aaaaa-aaaaa-cai')
  assert.equal(mocknet.createCanister({ specifiedId: canisterIdFromIndex(2) }).toText(), 'ryjl3-tyaaa-aaaaa-aaaba-cai')
  assert.equal(mocknet.createCanister().toText(), 'rrkah-fqaaa-aaaaa-aaaaq-cai')
  // index 2 is taken, so the next one is 3
  assert.equal(mocknet.createCanister().toText(), canisterIdFromIndex(3).toText())
  assert.throws(()=>mocknet.createCanister({ specifiedId: canisterIdFromIndex(2) }), /already exists/)
  assert.equal(await mocknet.getCyclesBalance(canisterIdFromIndex(0)), Mocknet.INITIAL_CYCLES)
  assert.equal(mocknet.createCanister({ cycles: 5n, name: 'poor' }).toText(), canisterIdFromIndex(4).toText())
  assert.equal(mocknet.getCanister(canisterIdFromIndex(4)).name, 'poor')
  assert.throws(()=>mocknet.getCanister(canisterIdFromIndex(9)), /no canister/)
}

export async function testInstall () {
  const mocknet = new Mocknet({ now: genesis })
  const connection = new Connection({ endpoint: mocknet })
  const id = mocknet.createCanister()
  mocknet.install(id, Counter, 3n)
  assert.throws(()=>mocknet.install(id, Counter, 1n), /already has code installed/)
  await connection.update(id, 'set', [8n], z.null())
  assert.equal(await connection.query(id, 'get', [], z.bigint()), 8n)
  mocknet.install(id, Counter, 1n, 'reinstall')
  assert.equal(await connection.query(id, 'get', [], z.bigint()), 1n)
  assert.throws(()=>mocknet.install(id, Counter, 'one', 'reinstall'),
    /installing code on rwlgt-iiaaa-aaaaa-aaaaa-cai failed: Canister trapped: invalid install argument for counter/)
}

export async function testFailures () {
  const mocknet = new Mocknet({ now: genesis })
  const connection = new Connection({ endpoint: mocknet })
  const id = mocknet.createCanister()
  const missing = canisterIdFromIndex(7)
  await assert.rejects(()=>connection.update(missing, 'set', [], z.null()), (e: unknown) =>
    e instanceof CallRejected && e.rejectCode === RejectCode.DestinationInvalid)
  await assert.rejects(()=>connection.update(id, 'set', [], z.null()), (e: unknown) =>
    e instanceof CanisterError && e.rejectMessage === 'Canister rwlgt-iiaaa-aaaaa-aaaaa-cai is empty')
  mocknet.install(id, Counter, 0n)
  await assert.rejects(()=>connection.update(id, 'reset', [], z.null()), (e: unknown) =>
    e instanceof CanisterError && e.rejectMessage === "Canister rwlgt-iiaaa-aaaaa-aaaaa-cai has no update method 'reset'")
  await assert.rejects(()=>connection.query(id, 'set', [1n], z.null()), (e: unknown) =>
    e instanceof CanisterError && e.rejectMessage === "Canister rwlgt-iiaaa-aaaaa-aaaaa-cai has no query method 'set'")
  await assert.rejects(()=>connection.update(id, 'set', ['x'], z.null()), (e: unknown) =>
    e instanceof CanisterError && e.rejectMessage ===
      'Canister rwlgt-iiaaa-aaaaa-aaaaa-cai trapped: failed to decode arguments of set: Expected bigint, received string')
}

export async function testTime () {
  const mocknet = new Mocknet({ now: genesis })
  const connection = new Connection({ endpoint: mocknet })
  const id = mocknet.createCanister()
  mocknet.install(id, Counter, 0n)
  await connection.query(id, 'get', [], z.bigint())
  assert.equal(await mocknet.getTime(), genesis)
  await connection.update(id, 'inc', [], z.null())
  assert.equal(await mocknet.getTime(), genesis + Mocknet.ROUND_NANOS)
  mocknet.advance(60)
  assert.equal(mocknet.now, genesis + 61n * Mocknet.ROUND_NANOS)
}

export async function testFaults () {
  const mocknet = new Mocknet({ now: genesis })
  const caller = mocknet.createCanister()
  const counter = mocknet.createCanister()
  mocknet.install(counter, Counter, 0n)
  mocknet.install(caller, Counter, 0n)
  // Route as if `caller` made the call.
  const request = (method: string, args: unknown[] = [], cycles = 0n) => ({
    callee: counter, method, args, cycles, wait: 'bounded' as const, timeoutSeconds: 300
  })
  assert.equal(await mocknet.route(caller, request('get')), 0n)
  mocknet.inject({ kind: 'SysTransient', method: 'inc', times: 2 })
  await assert.rejects(()=>mocknet.route(caller, request('inc')), /SysTransient: injected SysTransient/)
  await assert.rejects(()=>mocknet.route(caller, request('inc')), /SysTransient: injected SysTransient/)
  assert.equal(await mocknet.route(caller, request('inc')), null)
  assert.equal(await mocknet.route(caller, request('get')), 1n)
  mocknet.inject({ kind: 'SysUnknown', callee: counter, executed: true })
  await assert.rejects(()=>mocknet.route(caller, request('inc')), /SysUnknown: injected SysUnknown/)
  assert.equal(await mocknet.route(caller, request('get')), 2n)
  mocknet.inject({ kind: 'SysUnknown', callee: counter })
  await assert.rejects(()=>mocknet.route(caller, request('inc')), /SysUnknown/)
  assert.equal(await mocknet.route(caller, request('get')), 2n)
  // Unbounded-wait calls always learn the outcome.
  mocknet.inject({ kind: 'SysUnknown', callee: counter })
  assert.equal(await mocknet.route(caller, { ...request('inc'), wait: 'unbounded' }), null)
  assert.equal(await mocknet.route(caller, request('get')), 3n)
  mocknet.inject({ kind: 'Trap', method: 'inc', message: 'boom' })
  await assert.rejects(()=>mocknet.route(caller, request('inc')),
    (e: unknown) => e instanceof CanisterError && e.rejectMessage === `Canister ${counter.toText()} trapped: boom`)
  mocknet.inject({ kind: 'CanisterReject', method: 'nothing', times: 1 })
  mocknet.heal()
  assert.deepEqual(mocknet.faults, [])
  // Cycles the callee doesn't accept come back.
  assert.equal(await mocknet.route(caller, request('get', [], 1_000n)), 3n)
  assert.equal(await mocknet.getCyclesBalance(caller), Mocknet.INITIAL_CYCLES)
  const poor = mocknet.createCanister({ cycles: 10n })
  await assert.rejects(()=>mocknet.route(poor, request('get', [], 1_000n)), (e: unknown) =>
    e instanceof CallRejected && e.sync && e.rejectCode === RejectCode.SysTransient)
}

export async function testTimeout () {
  const mocknet = new Mocknet({ now: genesis })
  const caller = mocknet.createCanister()
  const slow = mocknet.createCanister()
  mocknet.install(slow, defineCanister('slow', z.unknown(), ic => new SlowCanister(ic, mocknet)), null)
  const request = { callee: slow, method: 'work', args: [], cycles: 0n, timeoutSeconds: 300 }
  await assert.rejects(()=>mocknet.route(caller, { ...request, wait: 'bounded' }), (e: unknown) =>
    e instanceof SysUnknown && e.rejectMessage === `Timed out waiting for ${slow.toText()}.work`)
  assert.equal(await mocknet.route(caller, { ...request, wait: 'bounded', timeoutSeconds: 500 }), null)
  assert.equal(await mocknet.route(caller, { ...request, wait: 'unbounded' }), null)
}

export async function testDebugOutput () {
  const enabled = config.mocknet.debug
  const printed = (debug: boolean) => withOutputCounted(() => {
    config.mocknet.debug = debug
    new MocknetConsole('Mocknet').debug('routed a message')
    const mocknet = new Mocknet({ now: genesis })
    mocknet.install(mocknet.createCanister(), Counter, 0n)
  })
  try {
    assert.equal(printed(false), 0)
    assert.ok(printed(true) > 0)
  } finally {
    config.mocknet.debug = enabled
  }
}

/** Count everything written to the console while `fn` runs. */
function withOutputCounted (fn: ()=>void): number {
  let count = 0
  const { log, info, debug, warn, error, trace } = console
  const { write: stdout } = process.stdout
  const { write: stderr } = process.stderr
  const counted = (..._: unknown[]) => { count++ }
  console.log = console.info = console.debug = console.warn = console.error = console.trace = counted
  process.stdout.write = process.stderr.write = (..._: unknown[]) => { count++; return true }
  try {
    fn()
  } finally {
    Object.assign(console, { log, info, debug, warn, error, trace })
    process.stdout.write = stdout
    process.stderr.write = stderr
  }
  return count
}

/**

  Fadroma
  Copyright (C) 2022 Hack.bg

  This program is free software: you can redistribute it and/or modify
  it under the terms of the GNU Affero General Public License as published by
  the Free Software Foundation, either version 3 of the License, or
  (at your option) any later version.

  This program is distributed in the hope that it will be useful,
  but WITHOUT ANY WARRANTY; without even the implied warranty of
  MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the
  GNU Affero General Public License for more details.

  You should have received a copy of the GNU Affero General Public License
  along with this program.  If not, see <http://www.gnu.org/licenses/>.

**/

export * from './agent/agent'
export { Mocknet } from './mocknet/mocknet'
export type { Fault, FaultKind, InstallMode } from './mocknet/mocknet'
export { default as MocknetError } from './mocknet/MocknetError'
export * from './canisters/counter'
export * from './canisters/caller'
export * from './canisters/ledger'
export * from './canisters/xrc'
export * from './canisters/backend'
export * from './devnet/devnet'
export * from './devnet/dfx'
export * from './devnet/mocknet'
export { default as DevnetError } from './devnet/DevnetError'
export { setup, ledgerInitArgument, INITIAL_BACKEND_BALANCE } from './ops/setup'
export type { SetupOptions, SetupReceipt } from './ops/setup'
export { default as IccCommands, DevnetCommands, getDevnet, main } from './ops/cli'
export { IccConfig } from './config'

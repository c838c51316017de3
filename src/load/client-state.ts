/**
 * Connection states of a load client.
 *
 * Every state value is a frozen object created by `ClientStates`; a delayed
 * action holds on to the state it was scheduled in and proceeds only while
 * that very object is still current.
 */

import type { BrokerConnection } from '../stomp/types.js';

export type ClientState =
  | { readonly kind: 'INIT' }
  | {
      readonly kind: 'CONNECTING';
      readonly host: string;
      readonly port: number;
      readonly onComplete: () => void;
    }
  | { readonly kind: 'CONNECTED'; readonly connection: BrokerConnection }
  | { readonly kind: 'CLOSING' }
  | { readonly kind: 'DISCONNECTED' };

export type ClientStateKind = ClientState['kind'];

export type ConnectingState = Extract<ClientState, { kind: 'CONNECTING' }>;
export type ConnectedState = Extract<ClientState, { kind: 'CONNECTED' }>;
export type ClosingState = Extract<ClientState, { kind: 'CLOSING' }>;
export type DisconnectedState = Extract<ClientState, { kind: 'DISCONNECTED' }>;

export const ClientStates = {
  init(): ClientState {
    return Object.freeze({ kind: 'INIT' });
  },

  connecting(host: string, port: number, onComplete: () => void): ConnectingState {
    return Object.freeze({ kind: 'CONNECTING', host, port, onComplete });
  },

  connected(connection: BrokerConnection): ConnectedState {
    return Object.freeze({ kind: 'CONNECTED', connection });
  },

  closing(): ClosingState {
    return Object.freeze({ kind: 'CLOSING' });
  },

  disconnected(): DisconnectedState {
    return Object.freeze({ kind: 'DISCONNECTED' });
  },
} as const;

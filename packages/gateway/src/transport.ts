import WebSocket, { type RawData } from 'ws';

export interface SocketHandlers {
  onOpen(): void;
  onMessage(data: string): void;
  onClose(code: number, reason: string): void;
  onError(err: Error): void;
}

/** The slice of a WebSocket the session drives. */
export interface GatewaySocket {
  send(data: string): void;
  close(code: number, reason?: string): void;
}

export type SocketConnector = (url: string, handlers: SocketHandlers) => GatewaySocket;

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}

export const wsConnector: SocketConnector = (url, handlers) => {
  const ws = new WebSocket(url, { perMessageDeflate: false });
  ws.on('open', () => handlers.onOpen());
  ws.on('message', (data) => handlers.onMessage(rawDataToString(data)));
  ws.on('close', (code, reason) => handlers.onClose(code, reason.toString('utf8')));
  ws.on('error', (err) => handlers.onError(err));
  return {
    send: (data) => {
      if (ws.readyState === WebSocket.OPEN) ws.send(data);
    },
    close: (code, reason) => {
      if (ws.readyState === WebSocket.CLOSED) return;
      if (ws.readyState === WebSocket.CONNECTING) {
        ws.terminate();
        return;
      }
      ws.close(code, reason);
    },
  };
};

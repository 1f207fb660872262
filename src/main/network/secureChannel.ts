import * as fs from 'fs/promises';
import * as net from 'net';
import * as tls from 'tls';
import { logger } from '../utils/logger';
import { TransferError } from '../utils/errors';
import type { SecureClientOptions, SecureServerOptions } from '../../shared/types/config';

/**
 * TLS upgrade for an already-connected TCP socket.
 *
 * The whole trust decision lives in the options the channel is built from:
 * the client trusts exactly one anchor certificate and, unless
 * `verifyHostname` is set, accepts it for any host. The server presents one
 * fixed certificate/key pair to every connection.
 *
 * Once the returned TLS socket is established it is a plain duplex stream.
 */
export class SecureChannel {
  private constructor(
    private readonly client: SecureClientOptions | null,
    private readonly context: tls.SecureContext | null
  ) {}

  static forClient(options: SecureClientOptions): SecureChannel {
    return new SecureChannel(options, null);
  }

  static forServer(options: SecureServerOptions): SecureChannel {
    try {
      return new SecureChannel(null, tls.createSecureContext({ cert: options.cert, key: options.key }));
    } catch (error) {
      throw TransferError.handshake('Unable to load server certificate/key pair', error);
    }
  }

  get role(): 'client' | 'server' {
    return this.client ? 'client' : 'server';
  }

  /** Client-side handshake over `socket`, connected to `host`. */
  upgrade(socket: net.Socket, host: string): Promise<tls.TLSSocket> {
    const client = this.client;
    if (!client) {
      return Promise.reject(new Error('SecureChannel was created for the server role'));
    }

    return new Promise<tls.TLSSocket>((resolve, reject) => {
      const tlsSocket = tls.connect({
        socket,
        ca: [client.trustAnchor],
        rejectUnauthorized: true,
        servername: net.isIP(host) ? undefined : host,
        checkServerIdentity: client.verifyHostname
          ? tls.checkServerIdentity
          : () => undefined,
      });

      const cleanup = (): void => {
        tlsSocket.off('secureConnect', onSecure);
        tlsSocket.off('error', onError);
        tlsSocket.off('close', onClose);
      };
      const onSecure = (): void => {
        cleanup();
        logger.debug('TLS client handshake complete', {
          host,
          protocol: tlsSocket.getProtocol(),
        });
        resolve(tlsSocket);
      };
      const onError = (error: Error): void => {
        cleanup();
        tlsSocket.destroy();
        reject(TransferError.handshake(`TLS handshake with ${host} failed: ${error.message}`, error));
      };
      const onClose = (): void => {
        cleanup();
        reject(TransferError.handshake(`Connection to ${host} closed during TLS handshake`));
      };

      tlsSocket.once('secureConnect', onSecure);
      tlsSocket.once('error', onError);
      tlsSocket.once('close', onClose);
    });
  }

  /** Server-side handshake over an accepted `socket`. */
  accept(socket: net.Socket): Promise<tls.TLSSocket> {
    const context = this.context;
    if (!context) {
      return Promise.reject(new Error('SecureChannel was created for the client role'));
    }

    return new Promise<tls.TLSSocket>((resolve, reject) => {
      const tlsSocket = new tls.TLSSocket(socket, { isServer: true, secureContext: context });

      const cleanup = (): void => {
        tlsSocket.off('secure', onSecure);
        tlsSocket.off('error', onError);
        tlsSocket.off('close', onClose);
      };
      const onSecure = (): void => {
        cleanup();
        resolve(tlsSocket);
      };
      const onError = (error: Error): void => {
        cleanup();
        tlsSocket.destroy();
        reject(TransferError.handshake(`TLS handshake failed: ${error.message}`, error));
      };
      const onClose = (): void => {
        cleanup();
        reject(TransferError.handshake('Peer closed the connection during TLS handshake'));
      };

      tlsSocket.once('secure', onSecure);
      tlsSocket.once('error', onError);
      tlsSocket.once('close', onClose);
    });
  }
}

export async function loadSecureClient(
  trustAnchorFile: string,
  verifyHostname = false
): Promise<SecureChannel> {
  try {
    const trustAnchor = await fs.readFile(trustAnchorFile);
    logger.info(`Loaded trust anchor ${trustAnchorFile}`, { verifyHostname });
    return SecureChannel.forClient({ trustAnchor, verifyHostname });
  } catch (error) {
    logger.error('Failed to load trust anchor:', error);
    throw TransferError.from(error, 'HandshakeFailure');
  }
}

export async function loadSecureServer(certFile: string, keyFile: string): Promise<SecureChannel> {
  try {
    const [cert, key] = await Promise.all([fs.readFile(certFile), fs.readFile(keyFile)]);
    logger.info(`Loaded certificate ${certFile} and key ${keyFile}`);
    return SecureChannel.forServer({ cert, key });
  } catch (error) {
    logger.error('Failed to load certificate/key pair:', error);
    throw TransferError.from(error, 'HandshakeFailure');
  }
}

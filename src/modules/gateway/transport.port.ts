/**
 * CyberSource Gateway - Transport Port
 *
 * The gateway never opens a connection itself. Whatever delivers the
 * envelope implements this port; HttpTransport is the production adapter.
 *
 * Implementations:
 * - HttpTransport (axios)
 * - recording fakes in tests
 */
export interface TransportPort {
  /**
   * POST the envelope and resolve with the raw reply body
   *
   * @throws TransportError when no reply document came back
   */
  send(url: string, body: string): Promise<string>;
}

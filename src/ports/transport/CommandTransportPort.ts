export interface CommandTransportPort {
  /** Resolves once the transport has written the message; there is no device-level ack. */
  publish(topic: string, payload: Buffer): Promise<void>;
  close(): Promise<void>;
}

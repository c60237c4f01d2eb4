/**
 * Reports whether the transport can still reach a peer after discovery has
 * stopped advertising it.
 */
export type LivenessCheck = (peerId: string) => boolean;

/**
 * PeerView: cache of peer identities learned from discovery. Nothing but
 * discovery notifications writes to it.
 */
export class PeerView {
  private peers: Set<string> = new Set();

  constructor(private readonly isReachable: LivenessCheck = () => false) {}

  /** A peer was discovered. Returns true if it was not known before. */
  discovered(peerId: string): boolean {
    if (this.peers.has(peerId)) {
      return false;
    }
    this.peers.add(peerId);
    return true;
  }

  /**
   * A peer went away. It is kept when the liveness check still reaches it.
   * Returns true if it was removed.
   */
  departed(peerId: string): boolean {
    if (this.isReachable(peerId)) {
      return false;
    }
    return this.peers.delete(peerId);
  }

  currentPeers(): string[] {
    return Array.from(this.peers).sort();
  }
}

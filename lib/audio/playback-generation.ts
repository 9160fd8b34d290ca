/**
 * Playback Generation
 *
 * Tags every resolve-and-play request with a token. Any newer request,
 * a direct stream start or a stop advances the generation, so a resolution
 * that arrives afterwards is recognised as stale and discarded.
 */

export class PlaybackGeneration {
  private currentId = 0;

  /**
   * Issue a token for a new request; every earlier token becomes stale.
   */
  issue(): number {
    this.currentId++;
    return this.currentId;
  }

  /**
   * Invalidate outstanding tokens without starting a new request.
   */
  invalidate(): void {
    this.currentId++;
  }

  isStale(id: number): boolean {
    return this.currentId !== id;
  }

  getCurrentId(): number {
    return this.currentId;
  }
}

/**
 * Artifact storage for screenshot bytes
 *
 * Screenshot events carry only a reference so the event bus stays
 * transport-agnostic; the bytes are fetched separately by ref.
 * All data is lost when the process exits.
 */

import { randomUUID } from 'crypto';

export interface Artifact {
  ref: string;
  sessionId: string;
  mimeType: string;
  data: Uint8Array;
  createdAt: number;
}

export interface ArtifactStore {
  put(sessionId: string, data: Uint8Array, mimeType: string): Artifact;
  get(ref: string): Artifact | undefined;

  /** Remove artifacts older than the retention window; returns how many were removed */
  sweep(now: number): number;
}

export class InMemoryArtifactStore implements ArtifactStore {
  private readonly artifacts = new Map<string, Artifact>();
  private readonly retentionMs: number;
  private readonly now: () => number;

  constructor(options: { retentionMs?: number; now?: () => number } = {}) {
    this.retentionMs = options.retentionMs ?? 24 * 60 * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  put(sessionId: string, data: Uint8Array, mimeType: string): Artifact {
    const artifact: Artifact = {
      ref: randomUUID(),
      sessionId,
      mimeType,
      data,
      createdAt: this.now(),
    };
    this.artifacts.set(artifact.ref, artifact);
    return artifact;
  }

  get(ref: string): Artifact | undefined {
    return this.artifacts.get(ref);
  }

  sweep(now: number): number {
    let removed = 0;
    for (const [ref, artifact] of this.artifacts) {
      if (now - artifact.createdAt >= this.retentionMs) {
        this.artifacts.delete(ref);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.artifacts.size;
  }
}

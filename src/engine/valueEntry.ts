export class ValueEntry {
  readonly value: string;
  /**
   * Absolute expiry (epoch ms), null = never
   */
  readonly expiresAt: number | null;
  readonly createdAt: number;
  readonly updatedAt: number;

  constructor(value: string, expiresAt: number | null, now: number, createdAt?: number) {
    this.value = value;
    this.expiresAt = expiresAt;
    this.createdAt = createdAt ?? now;
    this.updatedAt = now;
  }

  isExpired(now: number): boolean {
    return this.expiresAt !== null && now >= this.expiresAt;
  }

  cloneWithValue(value: string, expiresAt: number | null, now: number): ValueEntry {
    return new ValueEntry(value, expiresAt, now, this.createdAt);
  }
}

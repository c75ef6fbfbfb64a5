/**
 * Key/value store contract available to handlers through the robot
 */

export interface StoreAdapter {
  get(key: string): string | undefined;
  set(key: string, value: string): void;
  delete(key: string): void;
  /** Point-in-time copy of every stored pair */
  all(): Record<string, string>;
  close(): void;
}

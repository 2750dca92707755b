/**
 * Holder for the currently connected accessibility service.
 *
 * The host sets it when its service connects and clears it on
 * disconnect; command handlers receive the handle at construction. A host
 * that can find its service again later installs a reconnect hook, which
 * is tried whenever a command finds the handle empty.
 */

import type { AccessibilityService } from "./base.js";

/** Resolves with the service once it is reachable again, else null. */
export type ReconnectHook = () => Promise<AccessibilityService | null>;

export class ServiceHandle {
  private instance: AccessibilityService | null = null;
  private reconnect: ReconnectHook | null = null;

  setReconnect(hook: ReconnectHook | null): void {
    this.reconnect = hook;
  }

  connect(service: AccessibilityService): void {
    this.instance = service;
  }

  /**
   * Clear the handle if `service` is still the connected instance. A stale
   * service disconnecting after a newer one connected leaves it in place.
   */
  disconnect(service: AccessibilityService): boolean {
    if (this.instance !== service) return false;
    this.instance = null;
    return true;
  }

  current(): AccessibilityService | null {
    return this.instance;
  }

  isActive(): boolean {
    return this.instance !== null;
  }

  /** True when a service is connected, after trying the reconnect hook if empty. */
  async ensureActive(): Promise<boolean> {
    if (this.instance) return true;
    if (!this.reconnect) return false;
    const service = await this.reconnect();
    if (service && !this.instance) this.connect(service);
    return this.instance !== null;
  }
}

import { GridBotError } from '../errors';

function normalize(identity: string): string {
  return identity.trim().toLowerCase();
}

/**
 * Single-owner access control with a pause switch.
 */
export class AccessControl {
  private owner: string;
  private paused = false;

  constructor(owner: string) {
    if (!owner || owner.trim() === '') {
      throw new GridBotError('INVALID_OWNER', 'Owner identity must not be empty');
    }
    this.owner = owner.trim();
  }

  getOwner(): string {
    return this.owner;
  }

  isPaused(): boolean {
    return this.paused;
  }

  isOwner(caller: string): boolean {
    return normalize(caller) === normalize(this.owner);
  }

  requireOwner(caller: string): void {
    if (!this.isOwner(caller)) {
      throw new GridBotError('UNAUTHORIZED', `Caller ${caller} is not the owner`);
    }
  }

  requireNotPaused(operation: string): void {
    if (this.paused) {
      throw new GridBotError('PAUSED', `Cannot ${operation} while paused`);
    }
  }

  requirePaused(operation: string): void {
    if (!this.paused) {
      throw new GridBotError('NOT_PAUSED', `Cannot ${operation} unless paused`);
    }
  }

  pause(caller: string): void {
    this.requireOwner(caller);
    this.requireNotPaused('pause');
    this.paused = true;
  }

  unpause(caller: string): void {
    this.requireOwner(caller);
    this.requirePaused('unpause');
    this.paused = false;
  }

  /**
   * Single-step handoff. Returns the previous owner.
   */
  transferOwnership(caller: string, newOwner: string): string {
    this.requireOwner(caller);
    if (!newOwner || newOwner.trim() === '') {
      throw new GridBotError('INVALID_OWNER', 'New owner identity must not be empty');
    }
    if (this.isOwner(newOwner)) {
      throw new GridBotError('INVALID_OWNER', 'New owner is already the owner');
    }
    const previous = this.owner;
    this.owner = newOwner.trim();
    return previous;
  }
}

/**
 * Write-once stop signal shared by the frame producer and the recorder that owns it.
 * Once set it stays set for the life of the session.
 */
export class StopFlag {
  private value = false;

  set(): void {
    this.value = true;
  }

  isSet(): boolean {
    return this.value;
  }
}

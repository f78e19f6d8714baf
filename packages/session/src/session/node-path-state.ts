/**
 * Current node path of a session. Listeners run synchronously on every
 * change; assigning an equal value is not a change.
 */
export class NodePathState {
  private value: string | null = null;
  private readonly listeners: ((previous: string | null, current: string) => void)[] = [];

  public get current(): string | null {
    return this.value;
  }

  /** @returns `true` when the value changed */
  public set(nodePath: string): boolean {
    if (nodePath === this.value) {
      return false;
    }
    const previous = this.value;
    this.value = nodePath;
    for (const listener of this.listeners) {
      listener(previous, nodePath);
    }
    return true;
  }

  public onChange(listener: (previous: string | null, current: string) => void): void {
    this.listeners.push(listener);
  }
}

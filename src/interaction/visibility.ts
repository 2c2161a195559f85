/**
 * Liveness token for self-rescheduling loops.
 *
 * A loop captures the token returned by show() and stops as soon as
 * isCurrent(token) is false. hide() takes effect synchronously, and a
 * hide followed by a show still ends loops started before the hide.
 */
export class Visibility {
  private generation = 0;
  private shown = false;

  get isShown(): boolean {
    return this.shown;
  }

  show(): number {
    this.generation += 1;
    this.shown = true;
    return this.generation;
  }

  hide(): void {
    this.generation += 1;
    this.shown = false;
  }

  isCurrent(token: number): boolean {
    return this.shown && token === this.generation;
  }
}

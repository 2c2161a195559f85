/**
 * App Module - Pager
 *
 * Exclusive switch between named pages. Exactly one page is current;
 * releases that ask for a registered page are turned into a switch here,
 * everything else is handed back to the caller unchanged.
 */
import { type Result, err, ok } from "neverthrow";

import type { Context } from "../context/index.js";
import type { KeyId } from "../device/index.js";
import { BLANK_ICON } from "../icon/index.js";
import { Lock } from "../lock.js";
import { createLogger } from "../logger.js";
import { type PagerError, duplicatePage, unknownPage } from "./errors.js";
import type { Application, NavigationOutcome } from "./schema.js";
import { handled, staleKeys, unionKeys } from "./transform.js";

const log = createLogger("pager");

type ActivePage = Readonly<{ name: string; app: Application }>;

export class Pager implements Application {
  private readonly pages: Map<string, Application>;
  private active: ActivePage;
  private readonly switching = new Lock();

  private constructor(
    pages: Map<string, Application>,
    readonly defaultPage: string,
    defaultApp: Application,
  ) {
    this.pages = pages;
    this.active = { name: defaultPage, app: defaultApp };
  }

  /**
   * Build a pager showing `defaultPage` first.
   */
  static create(
    pages: ReadonlyArray<readonly [string, Application]>,
    defaultPage: string,
  ): Result<Pager, PagerError> {
    const registered = new Map<string, Application>();
    for (const [name, app] of pages) {
      if (registered.has(name)) {
        return err(duplicatePage(name));
      }
      registered.set(name, app);
    }

    const defaultApp = registered.get(defaultPage);
    if (!defaultApp) {
      return err(unknownPage(defaultPage, [...registered.keys()]));
    }

    return ok(new Pager(registered, defaultPage, defaultApp));
  }

  // ===========================================================================
  // Pages
  // ===========================================================================

  get keys(): ReadonlySet<KeyId> {
    return unionKeys(this.pages.values());
  }

  get current(): Application {
    return this.active.app;
  }

  get currentName(): string {
    return this.active.name;
  }

  get pageNames(): readonly string[] {
    return [...this.pages.keys()];
  }

  page(name: string): Application | undefined {
    return this.pages.get(name);
  }

  addPage(name: string, app: Application): Result<void, PagerError> {
    if (this.pages.has(name)) {
      return err(duplicatePage(name));
    }
    this.pages.set(name, app);
    return ok(undefined);
  }

  /**
   * Hide the current page, show `name`, then blank the keys only the old
   * page owned. Switches on one pager never interleave.
   */
  async switchTo(ctx: Context, name: string): Promise<Result<void, PagerError>> {
    const next = this.pages.get(name);
    if (!next) {
      return err(unknownPage(name, this.pageNames));
    }

    await this.switching.run(async () => {
      const previous = this.active;
      await previous.app.onHide(ctx);
      this.active = { name, app: next };

      try {
        await next.onDisplay(ctx);
      } finally {
        const stale = staleKeys(previous.app.keys, next.keys);
        if (stale.size > 0) {
          ctx.setImage(stale, BLANK_ICON);
        }
      }

      log.info({ from: previous.name, to: name }, "Switched page");
    });

    return ok(undefined);
  }

  // ===========================================================================
  // Application
  // ===========================================================================

  async onDisplay(ctx: Context): Promise<void> {
    await this.switching.idle();
    await this.active.app.onDisplay(ctx);
  }

  async onHide(ctx: Context): Promise<void> {
    await this.switching.idle();
    await this.active.app.onHide(ctx);
  }

  async onPress(ctx: Context, key: KeyId): Promise<void> {
    await this.switching.idle();
    await this.active.app.onPress(ctx, key);
  }

  async onRelease(ctx: Context, key: KeyId): Promise<NavigationOutcome> {
    await this.switching.idle();
    const outcome = await this.active.app.onRelease(ctx, key);
    if (outcome.type === "HANDLED" || !this.pages.has(outcome.page)) {
      return outcome;
    }

    // switchTo only fails for unknown pages, which were handed back above
    const result = await this.switchTo(ctx, outcome.page);
    return result.isOk() ? handled() : outcome;
  }
}

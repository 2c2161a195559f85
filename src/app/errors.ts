/**
 * App Module - Error Types
 *
 * Errors raised while building or navigating a pager.
 */

export type PagerError =
  | {
      readonly type: "DUPLICATE_PAGE";
      readonly page: string;
      readonly message: string;
    }
  | {
      readonly type: "UNKNOWN_PAGE";
      readonly page: string;
      readonly known: readonly string[];
      readonly message: string;
    };

export function duplicatePage(page: string): PagerError {
  return {
    type: "DUPLICATE_PAGE",
    page,
    message: `Page "${page}" is already registered`,
  };
}

export function unknownPage(page: string, known: readonly string[]): PagerError {
  return {
    type: "UNKNOWN_PAGE",
    page,
    known,
    message: `No page named "${page}" (known: ${known.join(", ")})`,
  };
}

/**
 * Format a PagerError for logging.
 */
export function formatPagerError(error: PagerError): string {
  switch (error.type) {
    case "DUPLICATE_PAGE":
      return `Duplicate page: ${error.message}`;
    case "UNKNOWN_PAGE":
      return `Unknown page: ${error.message}`;
  }
}

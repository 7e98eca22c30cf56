import { UpstreamError, errorMessage } from "../../../lib/errors";

/** pg connection/query failures surface as persistence upstream errors. */
export async function withPersistence<T>(
  label: string,
  fn: () => Promise<T>
): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    if (e instanceof UpstreamError) throw e;
    throw new UpstreamError("persistence", `${label}: ${errorMessage(e)}`, {
      cause: e,
    });
  }
}

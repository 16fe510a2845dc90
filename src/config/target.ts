/**
 * Reachability check for the site under test, run once by global setup
 * before any suite starts against a real BASE_URL.
 */

export async function checkTarget(baseURL: string): Promise<void> {
  let res: Response;
  try {
    res = await fetch(baseURL, { method: "HEAD" });
  } catch (error) {
    throw new Error(`Target not reachable: ${baseURL}`, { cause: error });
  }
  if (!res.ok) {
    throw new Error(`Target not healthy: ${baseURL} (${res.status})`);
  }
}

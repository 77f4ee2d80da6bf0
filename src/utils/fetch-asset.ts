export interface FetchAssetOptions {
  timeout: number; // In milliseconds
  retries: number;
}

export interface FetchedAsset {
  content: Buffer;
  mimeType: string | null;
}

/**
 * Fetch a remote asset with timeout and exponential back-off between retries
 */
export async function fetchAsset(
  url: string,
  options: FetchAssetOptions,
): Promise<FetchedAsset> {
  let lastError: unknown = null;

  for (let attempt = 0; attempt <= options.retries; attempt++) {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), options.timeout);

    try {
      const response = await fetch(url, { signal: controller.signal });

      if (!response.ok) {
        throw new Error(`HTTP ${response.status}: ${response.statusText}`);
      }

      const contentType = response.headers.get("content-type");
      return {
        content: Buffer.from(await response.arrayBuffer()),
        // Drop parameters such as "; charset=binary"
        mimeType: contentType ? contentType.split(";")[0].trim() : null,
      };
    } catch (error) {
      lastError = error;
    } finally {
      clearTimeout(timeoutId);
    }

    if (attempt < options.retries) {
      await new Promise((r) => setTimeout(r, Math.pow(2, attempt) * 1000));
    }
  }

  throw lastError ?? new Error("Download failed");
}

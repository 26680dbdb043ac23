import { ToolFailure } from '../errors';

export type FetchFn = typeof fetch;

/**
 * GETs a JSON document. Transport errors and non-2xx statuses surface as ToolFailure
 * so that the capability calling it can absorb them.
 */
export async function getJson(
    fetchFn: FetchFn,
    baseUrl: string,
    params: Record<string, string | number>,
    component: string
): Promise<unknown> {
    const url = new URL(baseUrl);
    for (const [key, value] of Object.entries(params)) {
        url.searchParams.set(key, String(value));
    }

    let response: Response;
    try {
        response = await fetchFn(url);
    } catch (error) {
        throw new ToolFailure(`Request to ${url.host} failed`, component, { url: url.toString() }, { cause: error });
    }

    if (!response.ok) {
        throw new ToolFailure(`Request to ${url.host} returned HTTP ${response.status}`, component, {
            url: url.toString(),
            status: response.status,
        });
    }

    try {
        return await response.json();
    } catch (error) {
        throw new ToolFailure(`Response from ${url.host} was not valid JSON`, component, { url: url.toString() }, { cause: error });
    }
}

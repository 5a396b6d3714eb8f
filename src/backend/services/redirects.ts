/**
 * Redirect target checks
 *
 * The login form honours a `next` parameter. It is only followed when it
 * resolves to the same origin the request came in on, so the login page
 * cannot be used to bounce users to another site.
 */

const ALLOWED_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * Returns true if `target`, resolved against `hostUrl`, stays on the same host.
 *
 * Relative paths such as `/` or `entries?x=1` are resolved first, so they pass.
 * Protocol-relative (`//evil.example`) and absolute URLs to another host fail,
 * as does any scheme other than http or https.
 *
 * @param target - The requested redirect target
 * @param hostUrl - The current request's origin, e.g. `http://localhost:5000/`
 */
export function isSafeRedirectTarget(target: string, hostUrl: string): boolean {
    let reference: URL;
    let resolved: URL;
    try {
        reference = new URL(hostUrl);
        resolved = new URL(target, reference);
    } catch {
        return false;
    }

    return ALLOWED_PROTOCOLS.has(resolved.protocol) && resolved.host === reference.host;
}

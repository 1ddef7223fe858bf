/**
 * Bearer check for serverless endpoints; an unset secret allows every request
 */
export function isAuthorized(authHeader: string | undefined, secret: string | undefined): boolean {
  return !secret || authHeader === `Bearer ${secret}`;
}

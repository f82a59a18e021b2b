/**
 * middleware/index.ts — Barrel export for the middleware layer.
 */

export {
  createNavigationThrottle,
  isAuthWallResponse,
  isBotBlockStatus,
  isPaywallResponse,
  unthrottled,
  type NavigationThrottle,
} from './compliance';

/**
 * Signature catalog: attack payloads, client tools and endpoint hints.
 */

export { ATTACK_SIGNATURES, detectAttacks, type AttackSignature } from './attack-signatures.js';
export { TOOL_SIGNATURES, detectTool, isBotUserAgent, type ToolSignature } from './tool-signatures.js';
export {
  isLoginPath,
  isIdentityPath,
  isApiEndpoint,
  isSensitiveEndpoint,
  hasSessionParameter,
} from './endpoint-hints.js';

export { extractBasicAuth } from './basic-auth.js';
export {
  DirectoryCallerAuthenticator,
  type DirectoryCallerAuthenticatorOptions,
} from './directory-caller-authenticator.js';

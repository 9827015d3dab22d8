/**
 * Identity Module
 *
 * @module identity
 */

export { InMemoryUserDirectory } from './userDirectory.js';
export type { DirectoryUserInput } from './userDirectory.js';
export { DirectoryIdentityProvider } from './directoryIdentityProvider.js';
export { loadDirectoryUsers, parseDirectoryUsers } from './directoryUsersFile.js';

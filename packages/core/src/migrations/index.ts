/**
 * Migration Module
 * Version history bookkeeping for migration runners
 */

export { VersionHistory, type VersionHistoryOptions } from './version-history';

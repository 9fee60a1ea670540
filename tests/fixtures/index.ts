/**
 * @format
 * Test Fixtures - Central Export
 *
 * @example
 * ```typescript
 * import {
 *   createNodeWorkspace,
 *   FakeMetadataSource,
 *   createTestConfig,
 *   TEST_PRIVATE_IP,
 * } from '../../fixtures';
 * ```
 */

// Constants
export {
    TEST_PRIVATE_IP,
    TEST_CLUSTER_NAME,
    TEST_NOW,
    TEST_NOW_SECONDS,
    createTestConfig,
} from './constants';

// Metadata and user data
export {
    FakeMetadataSource,
    userDataBody,
    encodeScript,
    type FakeMetadataOptions,
} from './metadata';

// Filesystem
export {
    TEMPLATE_PATH,
    createNodeWorkspace,
    readYamlFile,
    type NodeWorkspace,
} from './workspace';

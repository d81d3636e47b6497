export default [
    'packages/async-utils',
    'packages/shared/content-model',
    'packages/docsift-core',
];

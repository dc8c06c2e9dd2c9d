export * from './types.js';
export * from './cloudformation-provisioner.js';
export * from './s3-manager.js';
export * from './route53-manager.js';
export * from './cloudfront-manager.js';
export * from './identity-manager.js';

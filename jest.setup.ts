/**
 * Jest Test Setup
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
process.env.CLOUDCTL_VERSION = '0.4.0-test';
process.env.CLOUDCTL_GIT_SHA = 'abc1234';
delete process.env.CLOUDCTL_URL;
delete process.env.CLOUDCTL_APITOKEN;
delete process.env.CLOUDCTL_CONFIG;

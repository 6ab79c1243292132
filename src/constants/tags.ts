/**
 * Tag keys and values stamped on every resource a stack creates.
 * Cleanup discovers resources through the Stack tag.
 */

export const STACK_TAG = 'Stack';

export const CREATED_BY = 'aistack-deploy';

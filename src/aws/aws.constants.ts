export const EC2_CLIENT = Symbol('EC2_CLIENT');
export const CLOUDWATCH_CLIENT = Symbol('CLOUDWATCH_CLIENT');

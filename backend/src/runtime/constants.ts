// API Gateway HTTP API stage; its name prefixes every path the stage receives
export const API_GATEWAY_BASE_PATH = '/prod';

// Stage reported by Lambda Function URLs (and API Gateway's auto-deployed default stage)
export const FUNCTION_URL_STAGE = '$default';

// utils/apiClient.ts
import axios, { AxiosInstance } from 'axios';
import logger from './logger';
import { CONSTANTS } from './constants';

export interface ApiClientOptions {
    baseURL: string;
    bearerToken?: string;
    timeoutMs?: number;
}

/**
 * Axios instance for an upstream JSON API.
 * Retries are NOT configured here; callers own their retry policy.
 */
export const createApiClient = ({ baseURL, bearerToken, timeoutMs = CONSTANTS.METRICS.TIMEOUT_MS }: ApiClientOptions): AxiosInstance => {
    const client = axios.create({
        baseURL,
        timeout: timeoutMs,
        headers: {
            'User-Agent': CONSTANTS.METRICS.USER_AGENT,
            'Accept': 'application/json',
            ...(bearerToken ? { 'Authorization': `Bearer ${bearerToken}` } : {}),
        },
    });

    // Log slow/failed upstream requests without touching the error
    client.interceptors.response.use(
        (response) => response,
        (error: unknown) => {
            if (axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT')) {
                logger.warn(`⚠️ Request timed out: ${error.config?.url}`);
            }
            return Promise.reject(error);
        }
    );

    return client;
};

export default createApiClient;

export interface ApiResponse<T> {
    success: boolean;
    data?: T;
    message?: string;
    error?: string;
    timestamp: string;
}

export interface PaginationParams {
    offset: number;
    limit: number;
    total: number;
}

export interface PaginatedResponse<T> extends ApiResponse<T> {
    pagination: PaginationParams;
}

export interface ErrorResponse {
    success: false;
    error: string;
    message: string;
    timestamp: string;
    path?: string;
    method?: string;
    stack?: string;
}

export interface HealthCheckResponse {
    status: 'OK' | 'DEGRADED';
    timestamp: string;
    uptime: number;
    memory: NodeJS.MemoryUsage;
    version: string;
    snapshot: {
        loaded: boolean;
        transactions: number;
        evaluatedAt: string | null;
    };
}

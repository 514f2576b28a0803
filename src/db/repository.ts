import { Pool } from 'pg';

export type Operation = 'quote' | 'order' | 'track';

export interface OperationLogEntry {
    requestId: string;
    operation: Operation;
    environment: string;
    status: 'success' | 'error';
    durationMs: number;
    shipmentId?: number;
    errorCode?: string;
    errorMsg?: string;
}

export type Queryable = Pick<Pool, 'query'>;

/**
 * Audit trail of calls made to the service. Shipment and order state stays
 * with Fraktjakt; only the outcome of each call is kept here.
 */
export class OperationLogRepository {
    constructor(private pool: Queryable) { }

    async logOperation(entry: OperationLogEntry): Promise<void> {
        await this.pool.query(
            `INSERT INTO operation_log (request_id, operation, environment, status, duration_ms, shipment_id, error_code, error_msg)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
            [
                entry.requestId,
                entry.operation,
                entry.environment,
                entry.status,
                entry.durationMs,
                entry.shipmentId ?? null,
                entry.errorCode ?? null,
                entry.errorMsg ?? null,
            ],
        );
    }

    async findByRequestId(requestId: string): Promise<OperationLogEntry[]> {
        const result = await this.pool.query(
            `SELECT request_id, operation, environment, status, duration_ms, shipment_id, error_code, error_msg
       FROM operation_log
       WHERE request_id = $1
       ORDER BY created_at ASC`,
            [requestId],
        );

        return result.rows.map(row => ({
            requestId: row.request_id,
            operation: row.operation,
            environment: row.environment,
            status: row.status,
            durationMs: row.duration_ms,
            shipmentId: row.shipment_id ?? undefined,
            errorCode: row.error_code ?? undefined,
            errorMsg: row.error_msg ?? undefined,
        }));
    }
}

import type { ResultSetHeader, RowDataPacket } from "mysql2";
import { pool } from "../config/database";
import logger from "../config/logger";
import { StoreError } from "../common/errors";
import { isDuplicateKeyError } from "../common/functions";

export type QueryParam = string | number | boolean | Date | null;

const runQuery = async <T extends RowDataPacket[] | ResultSetHeader = RowDataPacket[]>(
  query: string,
  params: QueryParam[] = []
): Promise<{ rows: T }> => {
  try {
    const [rows] = await pool.execute<T>(query, params);
    return { rows };
  } catch (error) {
    if (isDuplicateKeyError(error)) {
      throw new StoreError('ConstraintViolation', 'Duplicate key', { cause: error });
    }
    logger.error({ err: error }, 'Database query error');
    throw error;
  }
};
export default runQuery;

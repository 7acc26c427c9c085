/**
 * 输入校验
 */

import { z } from 'zod';
import { SessionIdSchema, UserInputSchema } from './schemas';
import { ValidationError } from './errors';

function check(schema: z.ZodType<string>, value: unknown, field: string): string {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
        throw new ValidationError(parsed.error.issues[0].message, field);
    }
    return parsed.data;
}

/**
 * @throws {ValidationError} 空输入、超长或包含控制字符
 */
export function validateUserInput(text: unknown): string {
    return check(UserInputSchema, text, 'text');
}

/**
 * @throws {ValidationError} 会话 ID 格式非法
 */
export function validateSessionId(sessionId: unknown): string {
    return check(SessionIdSchema, sessionId, 'sessionId');
}

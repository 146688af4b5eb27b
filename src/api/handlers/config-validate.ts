import type { Request, Response } from 'express';
import type { ConfigValidationData } from '../../types/api.js';
import { validateRuntimeConfig } from '../../config/env-validator.js';
import { sendOk } from '../shared.js';

/** GET /config/validate: Returns a full runtime config validation report. */
export function handleConfigValidate() {
    return (_req: Request, res: Response): void => {
        const result = validateRuntimeConfig();

        const data: ConfigValidationData = {
            ok: result.ok,
            presentKeys: result.presentKeys,
            issues: result.issues,
            fatalIssues: result.fatalIssues,
            validatedAt: result.validatedAt,
        };

        // 200 even with issues; `ok` in the body carries the verdict.
        sendOk(res, data);
    };
}

import { Router } from "express";
import { z } from "zod";
import {
    ActionParams,
    isReviewActionName,
    ReviewActionHandler,
} from "../services/review/reviewActions";
import { sendRouteError } from "./routeErrorResponse";

const paramsSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

function toActionParams(body: unknown): ActionParams | null {
    if (body === undefined || body === null) {
        return {};
    }
    const parsed = paramsSchema.safeParse(body);
    if (!parsed.success) {
        return null;
    }
    const params: ActionParams = {};
    for (const [key, value] of Object.entries(parsed.data)) {
        params[key] = String(value);
    }
    return params;
}

/**
 * POST /:group/:verb with a flat JSON object of parameters.
 */
export function createActionsRouter(actions: ReviewActionHandler): Router {
    const router = Router();

    router.post("/:group/:verb", async (req, res, next) => {
        const name = `${req.params.group}/${req.params.verb}`.toLowerCase();
        const params = toActionParams(req.body);
        if (!params) {
            return sendRouteError(res, 400, "Action parameters must be a flat object", {
                ok: false,
                code: "INVALID_PARAMS",
            });
        }

        try {
            const result = await actions.dispatch(name, params);
            return res.status(isReviewActionName(name) ? 200 : 404).json(result);
        } catch (error) {
            next(error);
        }
    });

    return router;
}

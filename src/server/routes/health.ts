import type { Request, Response } from "express";

export interface HealthRouteContext {
    activeIngestions: number;
}

export function handleHealthRequest(_req: Request, res: Response, context: HealthRouteContext): void {
    res.json({ status: "ok", activeIngestions: context.activeIngestions });
}

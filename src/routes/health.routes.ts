import { Router, Request, Response } from 'express'

const router = Router()

router.get('/', (_req: Request, res: Response) => {
    res.json({
        ok: true,
        service: 'report-digest',
        status: 'healthy',
        uptimeSeconds: Math.round(process.uptime()),
    })
})

export default router

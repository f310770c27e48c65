/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * epg.ts: XMLTV guide route for TwitchTuner.
 */
import type { Express, Request, Response } from "express";
import type { AppContext } from "../context.js";
import { generateXmltv } from "../guide/xmltv.js";

/**
 * Creates the guide endpoints. Plex and most IPTV clients ask for /epg.xml; /xmltv.xml is the other name commonly configured.
 * @param app - The Express application.
 * @param ctx - Application services.
 */
export function setupEpgEndpoint(app: Express, ctx: AppContext): void {

  app.get([ "/epg.xml", "/xmltv.xml" ], (_req: Request, res: Response): void => {

    res.set("Content-Type", "text/xml; charset=utf-8");
    res.send(generateXmltv(ctx.store.getChannels(), new Date()));
  });
}

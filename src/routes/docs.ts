import { Router } from "express";
import swaggerUi from "swagger-ui-express";
import { buildOpenApiDocument } from "../docs/openapi.js";

export function docsRouter(version: string): Router {
  const document = buildOpenApiDocument(version);
  const router = Router();

  router.get("/openapi.json", (_req, res) => {
    res.json(document);
  });
  // The UI loads the same document over HTTP.
  router.use("/docs", swaggerUi.serve, swaggerUi.setup(undefined, {
    customSiteTitle: "Async Completion Bridge",
    swaggerOptions: { url: "/openapi.json" },
  }));

  return router;
}

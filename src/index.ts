import express from "express";
import cors from "cors";
import { Request, Response, NextFunction } from "express";
import homeworkRoutes from "./routes/homework-routes";
import { getCorsOrigins, isDevelopment } from "./config/app-config";
import { HttpError, sendError } from "./utils/http-errors";

const app = express();

/**
 * App setup: parsers, CORS
 */
app.use(express.urlencoded({ extended: true }));
app.use(express.json());
app.use(cors({ origin: getCorsOrigins() }));

/**
 * Route mounts (prefix → router)
 * - /api -> homeworkRoutes
 */
app.use("/api", homeworkRoutes);

/** GET / — simple health check */
app.get("/", (req, res) => {
  console.log("Sending Greetings!");
  res.json({ message: "Hello World from homework-ai-proxy" });
});

/** 404 handler for unmatched routes */
app.use((req, res, next) => {
  next(new HttpError("Route Not Found", 404));
});

interface BodyParserError extends Error {
  type?: string;
  status?: number;
}

/** Error serializer */
app.use(
  (error: BodyParserError, req: Request, res: Response, next: NextFunction) => {
    if (isDevelopment() && error.stack) {
      console.error("[homework-ai]", error.stack);
    }
    if (error.type === "entity.parse.failed") {
      return sendError(res, new HttpError("Request body must be valid JSON.", 400));
    }
    if (!(error instanceof HttpError) && typeof error.status === "number") {
      return sendError(res, new HttpError(error.message, error.status));
    }
    return sendError(res, error);
  },
);

export default app;

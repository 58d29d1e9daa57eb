import { Request, Response, NextFunction, ErrorRequestHandler } from "express";
import { AppError } from "../errors";
import { Logger } from "../logger";

export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        logger.warn({ path: req.path, err: error }, error.message);
      }
      res.status(error.statusCode).json({
        error: error.code,
        message: error.message,
      });
      return;
    }

    // express.json() 파싱 실패
    if (error instanceof SyntaxError && "status" in error && error.status === 400) {
      res.status(400).json({ error: "Bad Request", message: "Malformed JSON body" });
      return;
    }

    logger.error({ path: req.path, err: error }, "unhandled error");
    res.status(500).json({
      error: "Internal Server Error",
      message: "Unexpected error. Please try again later.",
    });
  };
}

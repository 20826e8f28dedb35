import { Router } from "express";
import {
  dispatchTask,
  evaluateAnswers,
  generateQuestionPaper,
  generateQuiz,
  generateYearEndPaper,
  getHint,
  methodNotAllowed,
} from "../controller/homework-controller";
import { verifySharedSecret } from "../middleware/shared-secret";

const router = Router();

/**
 * Routes (mounted at /api in index.ts)
 * Preflight OPTIONS is answered by the cors middleware before it gets here.
 */
router.use(verifySharedSecret);

/** POST /generate — 5-question quiz for one topic */
router.post(["/generate", "/generate-quiz"], generateQuiz);

/** POST /question-paper — longer mixed paper for one subject */
router.post(
  ["/question-paper", "/generate-question-paper"],
  generateQuestionPaper,
);

/** POST /generate-year-end — three-section P3 practice paper */
router.post(
  ["/generate-year-end", "/generate-year-end-paper"],
  generateYearEndPaper,
);

/** POST /evaluate — mark student answers */
router.post("/evaluate", evaluateAnswers);

/** POST /get-hint — one-sentence hint, plain text */
router.post("/get-hint", getHint);

/** POST /dispatch — single entry point, task in ?path= or body.__route */
router.post("/dispatch", dispatchTask);

router.all(
  [
    "/generate",
    "/generate-quiz",
    "/question-paper",
    "/generate-question-paper",
    "/generate-year-end",
    "/generate-year-end-paper",
    "/evaluate",
    "/get-hint",
    "/dispatch",
  ],
  methodNotAllowed,
);

export default router;

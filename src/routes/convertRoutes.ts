// routes/convertRoutes.ts
import { Response, Router } from "express";
import { ConverterError } from "../errors/converter/ConverterErrorTypes";
import { serviceFactory } from "../services/serviceFactory";
import { parseLineReference } from "../utils/lineNumbers";
import { toConvertResponse, toMappingResponse } from "../utils/toResponse";
import { validateConvertRequest } from "../utils/validateConvertRequest";

const router = Router();

const sendConverterError = (res: Response, error: ConverterError) => {
  res.status(error.statusCode).json({ error: error.message });
};

// POST /api/convert - Convert HTML to numbered markdown with line mappings
router.post("/", (req, res) => {
  const { converterService } = serviceFactory.getServices();

  try {
    const htmlText = validateConvertRequest(req.body);
    const { result, sessionId } = converterService.convertHtmlText(htmlText);

    if (result.status === "error") {
      res.status(422).json(toConvertResponse(result));
      return;
    }

    res.json(toConvertResponse(result, sessionId));
  } catch (error) {
    if (error instanceof ConverterError) {
      sendConverterError(res, error);
      return;
    }
    console.error("Failed to convert HTML:", error);
    res.status(500).json({
      error: "Failed to convert HTML",
      details: error instanceof Error ? error.message : "Unknown error",
    });
  }
});

// GET /api/convert/:sessionId/lines/:lineNumber - Find the HTML block behind a markdown line
router.get("/:sessionId/lines/:lineNumber", (req, res) => {
  const { converterService } = serviceFactory.getServices();
  const { sessionId, lineNumber } = req.params;

  try {
    const mapping = converterService.findHtmlByLine(sessionId, parseLineReference(lineNumber));
    res.json(mapping ? toMappingResponse(mapping) : {});
  } catch (error) {
    if (error instanceof ConverterError) {
      sendConverterError(res, error);
      return;
    }
    console.error("Failed to look up markdown line:", error);
    res.status(500).json({
      error: "Failed to look up markdown line",
      details: error instanceof Error ? error.message : "Unknown error",
    });
  }
});

// DELETE /api/convert/:sessionId - Drop a stored mapping session
router.delete("/:sessionId", (req, res) => {
  const { converterService } = serviceFactory.getServices();

  try {
    converterService.deleteSession(req.params.sessionId);
    res.status(204).end();
  } catch (error) {
    if (error instanceof ConverterError) {
      sendConverterError(res, error);
      return;
    }
    console.error("Failed to delete mapping session:", error);
    res.status(500).json({ error: "Failed to delete mapping session" });
  }
});

export const convertRouter = router;

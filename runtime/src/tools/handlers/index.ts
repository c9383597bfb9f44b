import type { ToolHandler, ToolName } from "../types.js";
import { GOOGLE_NOT_CONNECTED, MEDIA_TIMEOUT_MULTIPLIER, checkPdfPages, hostTool, unwrapOutcome, withAccessToken } from "./host.js";
import { fileInfo, readFile, writeFile } from "./local.js";
import { runJavascript, unwrapExecution } from "./sandbox.js";

export const TOOL_HANDLERS: Record<ToolName, ToolHandler> = {
  web_fetch: hostTool("web_fetch"),
  headless_browser: hostTool("headless_browser"),
  read_pdf: hostTool("read_pdf", { prepare: checkPdfPages }),
  create_pdf: hostTool("create_pdf"),
  convert_document: hostTool("convert_document"),
  read_docx: hostTool("read_docx"),
  modify_docx: hostTool("modify_docx"),
  read_pptx: hostTool("read_pptx"),
  modify_pptx: hostTool("modify_pptx"),
  read_xlsx: hostTool("read_xlsx"),
  modify_xlsx: hostTool("modify_xlsx"),
  create_zip: hostTool("create_zip"),
  download_media: hostTool("download_media", { timeoutMultiplier: MEDIA_TIMEOUT_MULTIPLIER }),
  ffmpeg_process: hostTool("ffmpeg_process", { hostName: "ffmpeg", timeoutMultiplier: MEDIA_TIMEOUT_MULTIPLIER }),
  smart_crop: hostTool("smart_crop", { timeoutMultiplier: MEDIA_TIMEOUT_MULTIPLIER }),
  ocr_image: hostTool("ocr_image", { hostName: "ocr" }),
  google_calendar: hostTool("google_calendar", { prepare: withAccessToken }),
  gmail: hostTool("gmail", { prepare: withAccessToken }),
  file_info: fileInfo,
  read_file: readFile,
  write_file: writeFile,
  run_javascript: runJavascript,
};

export { GOOGLE_NOT_CONNECTED, MEDIA_TIMEOUT_MULTIPLIER, unwrapOutcome, unwrapExecution };

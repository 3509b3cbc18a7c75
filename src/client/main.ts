import { SummarizeApiClient } from "./api.js";
import { SummaryController } from "./controller.js";
import { mountSummaryView } from "./view.js";

// The server fills this tag from PUBLIC_API_BASE_URL; empty means same origin.
const baseUrl = document.querySelector<HTMLMetaElement>('meta[name="summarizer-api-base-url"]')?.content ?? "";
const root = document.getElementById("app");

if (root) {
  mountSummaryView(root, new SummaryController<File>(new SummarizeApiClient({ baseUrl })));
} else {
  console.error("[error] #app element not found");
}

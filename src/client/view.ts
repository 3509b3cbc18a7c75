import type { SummaryController } from "./controller.js";
import { canSubmit, submitLabel, visibleOutput, type ClientSummaryState } from "./state.js";

function requireElement<T extends Element>(root: ParentNode, role: string, type: { new (): T }): T {
  const element = root.querySelector(`[data-role="${role}"]`);
  if (!(element instanceof type)) {
    throw new Error(`Missing [data-role="${role}"] element`);
  }
  return element;
}

/** Wires the page markup to the controller. Returns a function that detaches it. */
export function mountSummaryView(root: ParentNode, controller: SummaryController<File>): () => void {
  const fileInput = requireElement(root, "file-input", HTMLInputElement);
  const fileName = requireElement(root, "file-name", HTMLElement);
  const submit = requireElement(root, "submit", HTMLButtonElement);
  const errorBox = requireElement(root, "error", HTMLElement);
  const errorMessage = requireElement(root, "error-message", HTMLElement);
  const summaryBox = requireElement(root, "summary", HTMLElement);
  const summaryText = requireElement(root, "summary-text", HTMLElement);

  const render = (state: ClientSummaryState<File>) => {
    fileName.textContent = state.document ? state.document.name : "No file selected";
    fileInput.disabled = state.isSummarizing;
    submit.disabled = !canSubmit(state);
    submit.textContent = submitLabel(state);

    const output = visibleOutput(state);
    errorBox.hidden = output.kind !== "error";
    errorMessage.textContent = output.kind === "error" ? output.message : "";
    summaryBox.hidden = output.kind !== "summary";
    summaryText.textContent = output.kind === "summary" ? output.text : "";
  };

  const onChange = () => {
    controller.selectFile(fileInput.files?.[0] ?? null);
  };
  const onSubmit = () => {
    controller.submit().catch((error: unknown) => {
      console.error("[error] summarize request failed", error);
    });
  };

  fileInput.addEventListener("change", onChange);
  submit.addEventListener("click", onSubmit);
  const unsubscribe = controller.subscribe(render);
  render(controller.getState());

  return () => {
    fileInput.removeEventListener("change", onChange);
    submit.removeEventListener("click", onSubmit);
    unsubscribe();
  };
}

import { IngestError } from "../lib/errors.js";
import type { Language, SourceFileIndex } from "../types.js";

export function classifyLanguage(index: SourceFileIndex, hint?: Language): Language {
  const hasPython = index.py.length > 0;
  const hasCpp = index.cpp.length > 0;

  if (hasPython && !hasCpp) {
    return "py";
  }

  if (hasCpp && !hasPython) {
    return "cpp";
  }

  if (hasPython && hasCpp) {
    if (hint) {
      return hint;
    }

    throw new IngestError(
      "AmbiguousLanguage",
      "Archive contains both Python and C++ files; please specify file_type ('py' or 'cpp')."
    );
  }

  throw new IngestError("NoRecognizedSource", "No Python or C++ files found in the uploaded zip.");
}

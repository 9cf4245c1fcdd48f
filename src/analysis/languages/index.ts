import type { LanguageId } from "../../types.js";
import type { LanguageModule } from "../syntax.js";
import { javascriptLanguage, typescriptLanguage } from "./typescript.js";
import { pythonLanguage } from "./python.js";

const LANGUAGE_MODULES: ReadonlyMap<LanguageId, LanguageModule> = new Map(
  [typescriptLanguage, javascriptLanguage, pythonLanguage].map(
    (languageModule): [LanguageId, LanguageModule] => [languageModule.id, languageModule]
  )
);

export function languageModuleFor(language: LanguageId): LanguageModule | null {
  return LANGUAGE_MODULES.get(language) ?? null;
}

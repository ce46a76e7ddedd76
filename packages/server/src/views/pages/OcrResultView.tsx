import type { LanguageCode, OcrResult } from '@magic-chef/shared';
import { RecipeForm, emptyFormValues, formValuesFromDraft } from '../components/RecipeForm.js';

interface OcrResultViewProps {
  result: OcrResult;
  language: LanguageCode;
}

/** Recognised text plus a prefilled form the user saves through the normal create path. */
export function OcrResultView({ result, language }: OcrResultViewProps): JSX.Element {
  const values = result.draft
    ? formValuesFromDraft(result.draft, language)
    : { ...emptyFormValues(language), summary: result.text };

  return (
    <section className="ocr-result">
      <details>
        <summary>Recognised text</summary>
        <pre>{result.text}</pre>
      </details>
      {result.draft === null && (
        <p className="flash flash-warning">
          The text could not be structured automatically. It has been placed in the summary.
        </p>
      )}
      <RecipeForm action="/recipes" values={values} submitLabel="Save recipe" />
    </section>
  );
}

import {
  LANGUAGE_NAMES,
  SUPPORTED_LANGUAGES,
  formatIngredientLine,
  type LanguageCode,
  type RecipeDraft,
  type RecipeWithDetails,
} from '@magic-chef/shared';
import { StepRow } from './StepRow.js';

export interface RecipeFormValues {
  title: string;
  summary: string;
  language: LanguageCode;
  servings: string;
  total_time_minutes: string;
  steps: string[];
  ingredients: string;
  notes: string;
  tags: string;
  is_public: boolean;
}

export function emptyFormValues(language: LanguageCode): RecipeFormValues {
  return {
    title: '',
    summary: '',
    language,
    servings: '4',
    total_time_minutes: '',
    steps: [''],
    ingredients: '',
    notes: '',
    tags: '',
    is_public: false,
  };
}

export function formValuesFromRecipe(recipe: RecipeWithDetails): RecipeFormValues {
  return {
    title: recipe.title,
    summary: recipe.summary,
    language: recipe.language,
    servings: String(recipe.servings),
    total_time_minutes: recipe.total_time_minutes === null ? '' : String(recipe.total_time_minutes),
    steps: recipe.steps.map((step) => step.instruction),
    ingredients: recipe.ingredients.map(formatIngredientLine).join('\n'),
    notes: recipe.notes.join('\n'),
    tags: recipe.tags.join(', '),
    is_public: recipe.is_public,
  };
}

export function formValuesFromDraft(draft: RecipeDraft, language: LanguageCode): RecipeFormValues {
  return {
    title: draft.title,
    summary: draft.summary,
    language,
    servings: String(draft.servings ?? 4),
    total_time_minutes: draft.total_time_minutes === null ? '' : String(draft.total_time_minutes),
    steps: draft.steps.length > 0 ? draft.steps : [''],
    ingredients: draft.ingredients.map(formatIngredientLine).join('\n'),
    notes: draft.notes.join('\n'),
    tags: draft.tags.join(', '),
    is_public: false,
  };
}

interface RecipeFormProps {
  action: string;
  values: RecipeFormValues;
  submitLabel: string;
}

export function RecipeForm({ action, values, submitLabel }: RecipeFormProps): JSX.Element {
  return (
    <form
      className="recipe-form"
      method="post"
      action={action}
      encType="multipart/form-data"
      hx-post={action}
      hx-encoding="multipart/form-data"
    >
      <label>
        Title
        <input type="text" name="title" defaultValue={values.title} required />
      </label>
      <label>
        Summary
        <textarea name="summary" rows={3} defaultValue={values.summary}></textarea>
      </label>
      <div className="grid">
        <label>
          Language
          <select name="language" defaultValue={values.language}>
            {SUPPORTED_LANGUAGES.map((code) => (
              <option key={code} value={code}>
                {LANGUAGE_NAMES[code]}
              </option>
            ))}
          </select>
        </label>
        <label>
          Servings
          <input type="number" name="servings" min={1} defaultValue={values.servings} />
        </label>
        <label>
          Total time (minutes)
          <input type="number" name="total_time_minutes" min={0} defaultValue={values.total_time_minutes} />
        </label>
      </div>
      <label>
        Ingredients, one per line as "name | quantity"
        <textarea name="ingredients" rows={6} defaultValue={values.ingredients}></textarea>
      </label>
      <fieldset>
        <legend>Steps</legend>
        <div id="steps">
          {values.steps.map((step, index) => (
            <StepRow key={index} value={step} />
          ))}
        </div>
        <button
          type="button"
          className="secondary"
          hx-get="/recipes/steps/new"
          hx-target="#steps"
          hx-swap="beforeend"
        >
          Add step
        </button>
      </fieldset>
      <label>
        Notes, one per line
        <textarea name="notes" rows={3} defaultValue={values.notes}></textarea>
      </label>
      <label>
        Tags, comma separated
        <input type="text" name="tags" defaultValue={values.tags} />
      </label>
      <label>
        Image
        <input type="file" name="image" accept="image/png,image/jpeg,image/gif,image/webp" />
      </label>
      <label>
        <input type="checkbox" name="is_public" defaultChecked={values.is_public} />
        Public
      </label>
      <button type="submit">{submitLabel}</button>
    </form>
  );
}

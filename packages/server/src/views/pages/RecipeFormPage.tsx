import type { RecipeImageView } from '../../services/index.js';
import { ImageBlock } from '../components/ImageBlock.js';
import { RecipeForm, type RecipeFormValues } from '../components/RecipeForm.js';

type RecipeFormPageProps =
  | { mode: 'new'; values: RecipeFormValues }
  | { mode: 'edit'; recipeId: number; values: RecipeFormValues; images: readonly RecipeImageView[] };

export function RecipeFormPage(props: RecipeFormPageProps): JSX.Element {
  if (props.mode === 'new') {
    return (
      <section>
        <h1>New recipe</h1>
        <RecipeForm action="/recipes" values={props.values} submitLabel="Create recipe" />
      </section>
    );
  }

  return (
    <section>
      <h1>Edit recipe</h1>
      <ImageBlock recipeId={props.recipeId} images={props.images} editable={true} />
      <RecipeForm action={`/recipes/${props.recipeId}`} values={props.values} submitLabel="Save changes" />
      <p>
        <a href={`/recipes/${props.recipeId}`}>Cancel</a>
      </p>
    </section>
  );
}

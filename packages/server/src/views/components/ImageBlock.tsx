import type { RecipeImageView } from '../../services/index.js';

interface ImageBlockProps {
  recipeId: number;
  images: readonly RecipeImageView[];
  editable: boolean;
}

export function ImageBlock({ recipeId, images, editable }: ImageBlockProps): JSX.Element {
  return (
    <section id="recipe-images" className="recipe-images" data-recipe-id={recipeId}>
      {images.length === 0 && editable && <p>No images yet.</p>}
      {images.map((image) => (
        <figure key={image.id}>
          <img src={image.url} alt={image.alt_text} />
          {editable && (
            <button
              type="button"
              className="secondary outline"
              hx-post={`/recipes/${recipeId}/images/${image.id}/delete`}
              hx-target="#recipe-images"
              hx-swap="outerHTML"
              hx-confirm="Delete this image?"
            >
              Delete image
            </button>
          )}
        </figure>
      ))}
    </section>
  );
}

import { DIETS, type Diet } from '@magic-chef/shared';

const DIET_LABELS: Record<Diet, string> = {
  none: 'No restriction',
  vegetarian: 'Vegetarian',
  vegan: 'Vegan',
  pescatarian: 'Pescatarian',
  'gluten-free': 'Gluten-free',
  'dairy-free': 'Dairy-free',
};

function DietSelect(): JSX.Element {
  return (
    <label>
      Diet
      <select name="diet" defaultValue="none">
        {DIETS.map((diet) => (
          <option key={diet} value={diet}>
            {DIET_LABELS[diet]}
          </option>
        ))}
      </select>
    </label>
  );
}

export function AiPage(): JSX.Element {
  return (
    <section>
      <h1>AI chef</h1>
      <form hx-post="/recipes/ideas" hx-target="#dish-ideas" hx-indicator="#ideas-busy">
        <label>
          Ingredients, comma separated
          <input type="text" name="ingredients" placeholder="tomato, basil, garlic" required />
        </label>
        <div className="grid">
          <DietSelect />
          <label>
            Ideas
            <input type="number" name="count" min={1} max={20} defaultValue="10" />
          </label>
        </div>
        <label>
          <input type="checkbox" name="use_only" />
          Use only these ingredients
        </label>
        <button type="submit" className="secondary">
          Suggest dishes <span id="ideas-busy" className="htmx-indicator" aria-busy="true"></span>
        </button>
      </form>
      <div id="dish-ideas"></div>

      <form hx-post="/recipes/generate" hx-indicator="#generate-busy">
        <label>
          Dish title (optional)
          <input type="text" id="generate-title" name="title" />
        </label>
        <label>
          Ingredients, comma separated
          <input type="text" name="ingredients" placeholder="tomato, basil, garlic" required />
        </label>
        <div className="grid">
          <label>
            Servings
            <input type="number" name="servings" min={1} max={50} defaultValue="4" />
          </label>
          <DietSelect />
        </div>
        <label>
          <input type="checkbox" name="use_only" />
          Use only these ingredients
        </label>
        <button type="submit">
          Generate recipe <span id="generate-busy" className="htmx-indicator" aria-busy="true"></span>
        </button>
      </form>
    </section>
  );
}

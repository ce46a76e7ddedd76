interface DishIdeasProps {
  ideas: readonly string[];
}

/** Each idea fills the title field of the generator form. */
export function DishIdeas({ ideas }: DishIdeasProps): JSX.Element {
  return (
    <ul className="dish-ideas">
      {ideas.map((idea) => (
        <li key={idea}>
          <button
            type="button"
            className="outline"
            data-title={idea}
            hx-on--click="document.getElementById('generate-title').value = this.dataset.title"
          >
            {idea}
          </button>
        </li>
      ))}
    </ul>
  );
}

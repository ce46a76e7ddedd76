interface TagListProps {
  tags: readonly string[];
}

/** Clicking a tag runs a tag search into #search-results. */
export function TagList({ tags }: TagListProps): JSX.Element {
  if (tags.length === 0) {
    return <p className="tag-list">No tags yet.</p>;
  }
  return (
    <ul className="tag-list">
      {tags.map((tag) => (
        <li key={tag}>
          <a
            href={`/search?tag=${encodeURIComponent(tag)}`}
            hx-get={`/search/results?tag=${encodeURIComponent(tag)}`}
            hx-target="#search-results"
          >
            {tag}
          </a>
        </li>
      ))}
    </ul>
  );
}

import { formatBytes } from '../../types/errors.js';

interface DigitiserPageProps {
  maxUploadBytes: number;
}

export function DigitiserPage({ maxUploadBytes }: DigitiserPageProps): JSX.Element {
  return (
    <section>
      <h1>Digitise a recipe</h1>
      <p>Upload a photo or scan of a recipe (up to {formatBytes(maxUploadBytes)}). You can review the result before saving.</p>
      <form hx-post="/recipes/ocr" hx-encoding="multipart/form-data" hx-target="#ocr-result" hx-indicator="#ocr-busy">
        <input type="file" name="image" accept="image/png,image/jpeg,image/gif,image/webp,image/tiff" required />
        <button type="submit">
          Read recipe <span id="ocr-busy" className="htmx-indicator" aria-busy="true"></span>
        </button>
      </form>
      <div id="ocr-result"></div>
    </section>
  );
}

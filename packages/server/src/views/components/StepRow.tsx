interface StepRowProps {
  value?: string;
}

/** One instruction row of the recipe form; rows post as repeated `steps`. */
export function StepRow({ value = '' }: StepRowProps): JSX.Element {
  return (
    <div className="step-row">
      <textarea name="steps" rows={2} defaultValue={value} placeholder="Describe this step"></textarea>
      <button
        type="button"
        className="secondary outline"
        hx-on--click="this.closest('.step-row').remove()"
      >
        Remove
      </button>
    </div>
  );
}

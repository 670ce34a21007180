import { DescriptionGeneratorForm } from "@/components/description-generator-form";

const steps = [
  ["1. Download", "Fetches the audio, falling back across several client identities."],
  ["2. Transcribe", "Translates the speech into an English SRT with timestamps."],
  ["3. Describe", "Writes the description in the channel's language and format."],
];

export default function HomePage() {
  return (
    <main className="mx-auto flex min-h-screen w-full max-w-4xl flex-col gap-10 px-4 pb-20 pt-10 sm:px-6">
      <header className="glass rounded-3xl p-6 md:p-8">
        <p className="text-xs uppercase tracking-[0.22em] text-electric">Description Studio</p>
        <h1 className="mt-1 text-2xl font-semibold text-white sm:text-3xl">
          From video link to publish-ready description
        </h1>
        <p className="mt-3 max-w-3xl text-sm text-slate-300 sm:text-base">
          Paste a link and choose the channel style. The transcript and the generated description are
          available for download once the job completes.
        </p>

        <div className="mt-8">
          <DescriptionGeneratorForm />
        </div>
      </header>

      <section className="grid gap-3 md:grid-cols-3">
        {steps.map(([title, description]) => (
          <article key={title} className="glass rounded-2xl p-4">
            <p className="text-sm font-semibold text-electric">{title}</p>
            <p className="mt-1 text-xs text-slate-300">{description}</p>
          </article>
        ))}
      </section>
    </main>
  );
}

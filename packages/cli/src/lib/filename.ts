export const safeFilename = (input: string, fallback = "page") => {
  const trimmed = input.trim();
  if (!trimmed) {
    return fallback;
  }
  return (
    trimmed
      .replace(/[^a-zA-Z0-9._-]+/g, "_")
      .replace(/^_+|_+$/g, "")
      .slice(0, 120) || fallback
  );
};

/** `https://example.com/blog/post/` becomes `example.com_blog_post.html`. */
export const defaultOutputName = (pageUrl: string) => {
  let name = "";
  try {
    const url = new URL(pageUrl);
    name = `${url.hostname}${url.pathname}`;
  } catch {
    name = pageUrl;
  }
  return `${safeFilename(name)}.html`;
};

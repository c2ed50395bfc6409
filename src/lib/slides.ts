const HEADER_PREFIX = "# ";

export const isNumberedHeader = (line: string): boolean => {
  const trimmed = line.trim();
  if (!trimmed.startsWith(HEADER_PREFIX)) {
    return false;
  }
  const headerText = trimmed.slice(HEADER_PREFIX.length).trim();
  return headerText.length > 0 && headerText[0] >= "0" && headerText[0] <= "9";
};

// Lines before the first numbered header never belong to a slide.
export const splitSlides = (body: string, presentationMode: boolean): string[] => {
  if (!presentationMode || body === "") {
    return [];
  }

  const slides: string[] = [];
  let current: string[] = [];
  let foundHeader = false;

  for (const line of body.split("\n")) {
    const numbered = isNumberedHeader(line);
    if (numbered) {
      foundHeader = true;
      if (current.length > 0) {
        slides.push(current.join("\n"));
        current = [];
      }
    }

    if (foundHeader) {
      current.push(line);
    }
  }

  if (current.length > 0) {
    slides.push(current.join("\n"));
  }

  return slides;
};

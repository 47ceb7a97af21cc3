import * as sax from 'sax';
import { MalformedDocumentError } from '../../utils/errors';

/**
 * Minimal element tree built from a sax event stream.
 * Element and attribute names are stored without their namespace prefix.
 */
export interface XmlElement {
  name: string;
  attributes: Record<string, string>;
  children: XmlElement[];
  text: string;
}

function localName(name: string): string {
  const colon = name.indexOf(':');
  return colon >= 0 ? name.slice(colon + 1) : name;
}

export function parseXml(source: string): XmlElement {
  const parser = sax.parser(true, { trim: false, normalize: false });
  const stack: XmlElement[] = [];
  const roots: XmlElement[] = [];
  const failures: Error[] = [];

  parser.onerror = (error: Error) => {
    failures.push(error);
    parser.resume();
  };

  parser.onopentag = (tag) => {
    const attributes: Record<string, string> = {};
    for (const [key, value] of Object.entries(tag.attributes)) {
      // xml:lang keeps its prefix so it is not confused with a plain lang attribute
      const name = key.startsWith('xml:') ? key : localName(key);
      attributes[name] = typeof value === 'string' ? value : value.value;
    }
    const element: XmlElement = { name: localName(tag.name), attributes, children: [], text: '' };
    const parent = stack[stack.length - 1];
    if (parent) {
      parent.children.push(element);
    } else {
      roots.push(element);
    }
    stack.push(element);
  };

  const appendText = (text: string) => {
    const current = stack[stack.length - 1];
    if (current) {
      current.text += text;
    }
  };
  parser.ontext = appendText;
  parser.oncdata = appendText;

  parser.onclosetag = () => {
    const element = stack.pop();
    if (element) {
      element.text = element.text.trim();
    }
  };

  parser.write(source).close();

  if (failures.length > 0) {
    throw new MalformedDocumentError(`Invalid XML: ${failures[0].message.split('\n')[0]}`);
  }
  if (roots.length !== 1) {
    throw new MalformedDocumentError(roots.length === 0 ? 'Empty XML document' : 'More than one root element');
  }
  return roots[0];
}

export function children(element: XmlElement, name: string): XmlElement[] {
  return element.children.filter((entry) => entry.name === name);
}

export function firstChild(element: XmlElement, name: string): XmlElement | undefined {
  return element.children.find((entry) => entry.name === name);
}

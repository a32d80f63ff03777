import { ClientInfo, DeviceType, UNKNOWN } from "./tracking.types";

export interface UserAgentParser {
  parse(userAgent: string): ClientInfo;
}

interface BrowserPattern {
  name: string;
  engine: string;
  pattern: RegExp;
}

// Order matters: Edge and Opera also announce Chrome, Chrome announces Safari.
const BROWSERS: BrowserPattern[] = [
  { name: "Edge", engine: "Blink", pattern: /Edg(?:e|A|iOS)?\/([\d.]+)/i },
  { name: "Opera", engine: "Blink", pattern: /(?:OPR|Opera)\/([\d.]+)/i },
  { name: "Firefox", engine: "Gecko", pattern: /(?:Firefox|FxiOS)\/([\d.]+)/i },
  { name: "Chrome", engine: "Blink", pattern: /(?:Chrome|CriOS)\/([\d.]+)/i },
  { name: "Safari", engine: "WebKit", pattern: /Version\/([\d.]+).*Safari/i },
];

const OPERATING_SYSTEMS: Array<[RegExp, string]> = [
  [/Windows NT/i, "Windows"],
  [/iPhone|iPad|iPod/i, "iOS"],
  [/Android/i, "Android"],
  [/CrOS/i, "ChromeOS"],
  [/Mac OS X|Macintosh/i, "macOS"],
  [/Linux/i, "Linux"],
];

function detectDeviceType(userAgent: string): DeviceType {
  if (/iPad|Tablet|Android(?!.*Mobile)/i.test(userAgent)) return "tablet";
  if (/Mobile|iPhone|iPod|Android|BlackBerry|IEMobile|Opera Mini/i.test(userAgent)) return "mobile";
  return "desktop";
}

function detectBrandAndModel(userAgent: string): { brand: string; model: string } {
  if (/iPhone/i.test(userAgent)) return { brand: "Apple", model: "iPhone" };
  if (/iPad/i.test(userAgent)) return { brand: "Apple", model: "iPad" };
  if (/Macintosh/i.test(userAgent)) return { brand: "Apple", model: "Mac" };

  const samsung = /\b(SM-[A-Z0-9]+)/i.exec(userAgent);
  if (samsung || /Samsung/i.test(userAgent)) {
    return { brand: "Samsung", model: samsung ? samsung[1] : UNKNOWN };
  }

  const pixel = /\b(Pixel(?: \d+[a-z]?)?(?: Pro| XL)?)/i.exec(userAgent);
  if (pixel) return { brand: "Google", model: pixel[1] };

  if (/Huawei/i.test(userAgent)) return { brand: "Huawei", model: UNKNOWN };
  return { brand: UNKNOWN, model: UNKNOWN };
}

export class RegexUserAgentParser implements UserAgentParser {
  parse(userAgent: string): ClientInfo {
    if (!userAgent.trim()) {
      return {
        deviceType: "unknown",
        deviceOs: UNKNOWN,
        deviceBrand: UNKNOWN,
        deviceModel: UNKNOWN,
        browserName: UNKNOWN,
        browserVersion: UNKNOWN,
        browserEngine: UNKNOWN,
        isMobile: false,
      };
    }

    const deviceType = detectDeviceType(userAgent);
    const os = OPERATING_SYSTEMS.find(([pattern]) => pattern.test(userAgent));
    const { brand, model } = detectBrandAndModel(userAgent);

    let browserName = UNKNOWN;
    let browserVersion = UNKNOWN;
    let browserEngine = UNKNOWN;
    for (const browser of BROWSERS) {
      const match = browser.pattern.exec(userAgent);
      if (match) {
        browserName = browser.name;
        browserVersion = match[1];
        browserEngine = browser.engine;
        break;
      }
    }

    return {
      deviceType,
      deviceOs: os ? os[1] : UNKNOWN,
      deviceBrand: brand,
      deviceModel: model,
      browserName,
      browserVersion,
      browserEngine,
      isMobile: deviceType === "mobile" || deviceType === "tablet",
    };
  }
}

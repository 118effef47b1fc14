import * as cheerio from 'cheerio';
import { success, uncategorized } from '../../domain/entities/SourceQueryResult';
import { UnexpectedPageStructureError } from '../../domain/errors/ReviewErrors';
import { SessionContext } from '../http/SessionContext';
import { LookupOutcome, HttpSourceAdapter } from './ReputationSourceAdapter';

const FORM_PATH = '/Public/Tools/BrandReputation.aspx';

// ASP.NET anti-forgery / view-state fields the POST must echo back
const STATE_FIELDS = ['__VIEWSTATE', '__VIEWSTATEGENERATOR', '__EVENTVALIDATION'] as const;

export const MXTOOLBOX_ISSUES = {
    SAFE_BROWSING: 'Google SafeBrowsing issues found',
    PHISHTANK: 'PhishTank issues found',
} as const;

/**
 * MXToolbox brand reputation (Google SafeBrowsing and PhishTank listings).
 */
export class MxToolboxAdapter extends HttpSourceAdapter {
    readonly source = 'mxtoolbox' as const;
    protected readonly label = 'MXToolbox';

    protected async lookupOutcome(domain: string, signal: AbortSignal): Promise<LookupOutcome> {
        const session = new SessionContext();
        const formUrl = `${this.baseUrl}${FORM_PATH}`;
        const headers = { Origin: formUrl, Referer: formUrl };

        const formPage = await this.http.get<string>(formUrl, {
            headers: session.headers(headers),
            responseType: 'text',
            signal,
        });
        session.absorb(formPage.headers['set-cookie']);
        extractStateTokens(String(formPage.data), session);

        const form = new URLSearchParams({
            __EVENTTARGET: '',
            __EVENTARGUMENT: '',
            __VIEWSTATE: session.requireToken('__VIEWSTATE'),
            __VIEWSTATEGENERATOR: session.requireToken('__VIEWSTATEGENERATOR'),
            __EVENTVALIDATION: session.requireToken('__EVENTVALIDATION'),
            'ctl00$ContentPlaceHolder1$brandReputationUrl': domain,
            'ctl00$ContentPlaceHolder1$brandReputationDoLookup': 'Brand Reputation Lookup',
            'ctl00$ucSignIn$hfRegCode': 'missing',
            'ctl00$ucSignIn$hfRedirectSignUp': FORM_PATH,
            'ctl00$ucSignIn$hfRedirectLogin': '',
            'ctl00$ucSignIn$txtEmailAddress': '',
            'ctl00$ucSignIn$cbNewAccount': 'cbNewAccount',
            'ctl00$ucSignIn$txtFullName': '',
            'ctl00$ucSignIn$txtModalNewPassword': '',
            'ctl00$ucSignIn$txtPhone': '',
            'ctl00$ucSignIn$txtCompanyName': '',
            'ctl00$ucSignIn$drpTitle': '',
            'ctl00$ucSignIn$txtTitleName': '',
            'ctl00$ucSignIn$txtModalPassword': '',
        });

        const resultPage = await this.http.post<string>(formUrl, form.toString(), {
            headers: session.headers({ ...headers, 'Content-Type': 'application/x-www-form-urlencoded' }),
            responseType: 'text',
            signal,
        });

        return parseBrandReputation(String(resultPage.data));
    }
}

/**
 * Copies the hidden state fields of the form page into the session.
 * Missing fields are left out; requireToken() reports them.
 */
export function extractStateTokens(html: string, session: SessionContext): void {
    const $ = cheerio.load(html);
    for (const field of STATE_FIELDS) {
        session.setToken(field, $(`input[name="${field}"]`).attr('value'));
    }
}

/**
 * @throws UnexpectedPageStructureError when the page carries none of the result blocks
 * (error pages and the sign-in wall look like this)
 */
export function parseBrandReputation(html: string): LookupOutcome {
    const $ = cheerio.load(html);
    if ($('div#ctl00_ContentPlaceHolder1_noIssuesFound').length > 0) {
        return { outcome: uncategorized(), detail: 'No issues found' };
    }

    const issues: string[] = [];
    if ($('div#ctl00_ContentPlaceHolder1_googleSafeBrowsingIssuesFound').length > 0) {
        issues.push(MXTOOLBOX_ISSUES.SAFE_BROWSING);
    }
    if ($('div#ctl00_ContentPlaceHolder1_phishTankIssuesFound').length > 0) {
        issues.push(MXTOOLBOX_ISSUES.PHISHTANK);
    }
    if (issues.length === 0) {
        throw new UnexpectedPageStructureError('result block');
    }
    return { outcome: success(issues) };
}

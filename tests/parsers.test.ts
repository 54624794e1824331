import { describe, it, expect } from 'vitest';
import { parseAssignView, parseAssignmentLinks } from '../src/parsers/assignments.js';
import {
  parseCourseGroups,
  parseCourseLinks,
  parseGroupOptions,
  parsePracticeQuizLinks,
  sortCourses,
  toCourse,
} from '../src/parsers/courses.js';
import { formTarget, getField, parseAvailabilityOptions, parseForm, setField } from '../src/parsers/forms.js';
import { cleanGradeValue, effectiveGrade, parseGradingTable, parseMoodleGrade } from '../src/parsers/grading.js';
import { extractSesskey } from '../src/parsers/html.js';
import { parseQuizReport } from '../src/parsers/quiz-report.js';
import { parseTopics } from '../src/parsers/topics.js';
import { BASE_URL } from './helpers.js';

// ==================== Grades ====================

describe('cleanGradeValue', () => {
  it('maps empty and dash cells to "-"', () => {
    expect(cleanGradeValue('')).toBe('-');
    expect(cleanGradeValue('  ')).toBe('-');
    expect(cleanGradeValue('-')).toBe('-');
    expect(cleanGradeValue('- / 10.00')).toBe('-');
    expect(cleanGradeValue('--')).toBe('-');
  });

  it('keeps the "score / max" part of a graded cell', () => {
    expect(cleanGradeValue(' 12.00 / 15.00 ')).toBe('12.00 / 15.00');
    expect(cleanGradeValue('Grade: 8 / 10 (80%)')).toBe('8 / 10');
  });

  it('returns other text trimmed', () => {
    expect(cleanGradeValue(' Pass ')).toBe('Pass');
  });
});

describe('effectiveGrade', () => {
  it('prefers the final grade', () => {
    expect(effectiveGrade({ grade: '7.00 / 10.00', finalGrade: '8.00 / 10.00' })).toBe('8.00 / 10.00');
  });

  it('falls back to the grade column', () => {
    expect(effectiveGrade({ grade: '7.00 / 10.00', finalGrade: '-' })).toBe('7.00 / 10.00');
    expect(effectiveGrade({ grade: '', finalGrade: '' })).toBe('-');
  });
});

describe('parseMoodleGrade', () => {
  it('reads score and maximum', () => {
    expect(parseMoodleGrade('12.50 / 20.00')).toEqual({ score: 12.5, max: 20 });
  });

  it('returns nulls for ungraded cells', () => {
    expect(parseMoodleGrade('-')).toEqual({ score: null, max: null });
  });
});

// ==================== Assignments ====================

describe('parseAssignView', () => {
  const html = [
    '<div id="intro"><div class="no-overflow"><p>Build a  login page.</p>',
    '<ol><li>Use HTML</li><li>Add CSS</li></ol><ul><li>Submit a link</li></ul><br></div></div>',
    '<table class="generaltable">',
    '<tr><th>Participants</th><td>30</td></tr>',
    '<tr><th>Submitted</th><td>12</td></tr>',
    '<tr><th>Needs grading</th><td>5</td></tr>',
    '<tr><th>Due date</th><td>Friday, 6 March 2026, 11:59 PM</td></tr>',
    '<tr><th>Time remaining</th><td>2 days 3 hours</td></tr>',
    '</table>',
    '<table class="generaltable">',
    '<tr><th>Submission status</th><td>No attempt</td></tr>',
    '<tr><th>Grading status</th><td>Not graded</td></tr>',
    '</table>',
    '<table><tr><th>Maximum grade</th><td>15.00</td></tr></table>',
    '<a href="#">Comments (3)</a>',
  ].join('');

  it('reads the summary tables, intro and comment count', () => {
    expect(parseAssignView(html)).toEqual({
      participants: '30',
      drafts: '',
      submitted: '12',
      needsGrading: '5',
      latePolicy: '',
      dueDate: 'Friday, 6 March 2026, 11:59 PM',
      timeRemaining: '2 days 3 hours',
      submissionStatus: 'No attempt',
      gradingStatus: 'Not graded',
      lastModified: '',
      commentCount: '3',
      maxGrade: '15.00',
      description: 'Build a login page.\n1. Use HTML\n2. Add CSS\n• Submit a link',
    });
  });

  it('returns empty fields for an unrelated page', () => {
    const details = parseAssignView('<p>Nothing here</p>');
    expect(details.participants).toBe('');
    expect(details.description).toBe('');
  });
});

describe('parseAssignmentLinks', () => {
  it('lists assignments in page order with cleaned names', () => {
    const html = [
      '<ul>',
      `<li class="activity assign modtype_assign" id="module-41"><a href="${BASE_URL}/mod/assign/view.php?id=41">`,
      '<span class="instancename">Week 1 Project<span class="accesshide "> Assignment</span></span></a></li>',
      '<li class="activity quiz modtype_quiz"><a href="/mod/quiz/view.php?id=42">Quiz</a></li>',
      '<li class="activity assign modtype_assign"><a href="/mod/assign/view.php?id=43">',
      '<span class="instancename">Essay Assignment</span></a></li>',
      '</ul>',
    ].join('');

    expect(parseAssignmentLinks(html, BASE_URL)).toEqual([
      { name: 'Week 1 Project', moduleId: '41', url: `${BASE_URL}/mod/assign/view.php?id=41` },
      { name: 'Essay', moduleId: '43', url: `${BASE_URL}/mod/assign/view.php?id=43` },
    ]);
  });
});

// ==================== Topics ====================

const COURSE_PAGE = [
  '<ul class="topics">',
  '<li id="section-0" class="section main" data-number="0" data-id="100" aria-label="General">',
  '<h3 class="sectionname"><span>General</span></h3>',
  '<div class="summary"><p>Welcome</p></div>',
  '<ul class="img-text"><li class="activity forum modtype_forum" id="module-1"><a href="/mod/forum/view.php?id=1">',
  '<span class="instancename">Announcements<span class="accesshide"> Forum</span></span></a></li></ul>',
  '</li>',
  '<li id="section-1" class="section main hidden" data-number="1" aria-label="Session 1">',
  '<h3 class="sectionname">Session 1</h3>',
  '<div class="availabilityinfo">Not available unless: You belong to Batch A</div>',
  '<ul class="img-text">',
  '<li class="activity label modtype_label" id="module-2"><div class="contentwithoutlink">Read the notes</div></li>',
  '<li class="activity quiz modtype_quiz" id="module-3"><a class="dimmed" href="/mod/quiz/view.php?id=3">',
  '<span class="instancename">Practice Quiz 1 Quiz</span></a><div class="availabilityinfo">Only after the lecture</div></li>',
  '</ul>',
  '</li>',
  '</ul>',
].join('');

describe('parseTopics', () => {
  it('reads topics, their activities and restrictions', () => {
    const parsed = parseTopics(COURSE_PAGE, BASE_URL);
    expect(parsed.topics).toEqual([
      {
        sectionNumber: 0,
        dbId: '100',
        name: 'General',
        visible: true,
        summary: 'Welcome',
        restrictionSummary: '',
        activities: [
          { id: '1', name: 'Announcements', type: 'forum', url: `${BASE_URL}/mod/forum/view.php?id=1`, visible: true },
        ],
        activityCount: 1,
      },
      {
        sectionNumber: 1,
        dbId: '',
        name: 'Session 1',
        visible: false,
        summary: '',
        restrictionSummary: 'Not available unless: You belong to Batch A',
        activities: [
          { id: '2', name: 'Read the notes', type: 'label', url: '', visible: true },
          { id: '3', name: 'Practice Quiz 1', type: 'quiz', url: `${BASE_URL}/mod/quiz/view.php?id=3`, visible: false },
        ],
        activityCount: 2,
      },
    ]);
  });

  it('asks for edit mode when a topic has no section id', () => {
    expect(parseTopics(COURSE_PAGE, BASE_URL).needsEditMode).toBe(true);
  });

  it('gives the same result for the same page', () => {
    expect(parseTopics(COURSE_PAGE, BASE_URL)).toEqual(parseTopics(COURSE_PAGE, BASE_URL));
  });

  it('finds section ids in edit-mode markup', () => {
    const html = [
      '<li id="section-1" class="section main" data-number="1">',
      '<h3 class="sectionname"><span class="inplaceeditable" data-itemtype="sectionname" data-itemid="205">Day 1</span></h3>',
      '</li>',
      '<li id="section-2" class="section main" data-number="2">',
      '<h3 class="sectionname">Day 2</h3>',
      '<a href="editsection.php?id=300&amp;delete=1">Delete</a>',
      '<a href="/course/editsection.php?id=301&amp;sr=0">Edit</a>',
      '</li>',
    ].join('');

    const parsed = parseTopics(`<ul>${html}</ul>`, BASE_URL);
    expect(parsed.topics.map(t => t.dbId)).toEqual(['205', '301']);
    expect(parsed.needsEditMode).toBe(false);
  });
});

// ==================== Grading table ====================

describe('parseGradingTable', () => {
  const head = [
    '<thead><tr>',
    '<th>Select</th><th>First name / Surname</th><th>Email address</th><th>Status</th><th>Grade / 20.00</th>',
    '<th>Last modified (submission)</th><th>File submissions</th><th>Feedback comments</th><th>Final grade</th>',
    '</tr></thead>',
  ].join('');

  const body = [
    '<tbody>',
    '<tr class="user51"><td><input type="checkbox" name="selectedusers" value="51"></td>',
    '<td><a href="/user/view.php?id=51">Asha Nair</a></td><td>asha@example.test</td>',
    '<td><div>Submitted for grading</div><div>Graded</div></td><td>15.00 / 20.00</td><td>Monday, 2 March 2026</td>',
    `<td><div class="fileuploadsubmission"><a href="${BASE_URL}/pluginfile.php/9/assignsubmission_file/submission_files/1/report.pdf">report.pdf</a></div></td>`,
    '<td>Good work</td><td>15.00 / 20.00</td></tr>',
    '<tr class="user52"><td></td><td><a href="/user/view.php?id=52">Ravi Kumar</a></td><td>ravi@example.test</td>',
    '<td><div>No submission</div></td><td>-</td><td>-</td><td></td><td></td><td>-</td></tr>',
    '<tr class="emptyrow"><td></td><td></td><td></td><td></td><td></td><td></td><td></td><td></td><td></td></tr>',
    '</tbody>',
  ].join('');

  it('reads each student row by header position', () => {
    const table = parseGradingTable(`<table class="flexible generaltable generalbox">${head}${body}</table>`);

    expect(table.maxGrade).toBe(20);
    expect(table.rows).toEqual([
      {
        name: 'Asha Nair',
        userId: '51',
        email: 'asha@example.test',
        status: 'Submitted for grading | Graded',
        lastModified: 'Monday, 2 March 2026',
        submission: {
          type: 'file',
          files: [{ name: 'report.pdf', url: `${BASE_URL}/pluginfile.php/9/assignsubmission_file/submission_files/1/report.pdf` }],
        },
        feedback: 'Good work',
        grade: '15.00 / 20.00',
        finalGrade: '15.00 / 20.00',
        assignmentKind: 'file',
      },
      {
        name: 'Ravi Kumar',
        userId: '52',
        email: 'ravi@example.test',
        status: 'No submission',
        lastModified: '-',
        submission: { type: 'empty' },
        feedback: '',
        grade: '-',
        finalGrade: '-',
        assignmentKind: 'file',
      },
    ]);
  });

  it('treats online text assignments as link submissions', () => {
    const html = [
      '<table class="generaltable"><thead><tr>',
      '<th>Select</th><th>Full name</th><th>Email address</th><th>Status</th><th>Grade</th>',
      '<th>Last modified</th><th>Online text</th><th>Feedback comments</th><th>Final grade</th>',
      '</tr></thead><tbody>',
      '<tr class="user60"><td></td><td><a href="/user/view.php?id=60">Meera Das</a></td><td>meera@example.test</td>',
      '<td>Submitted</td><td>-</td><td>-</td><td><div class="no-overflow">https://github.com/example/site</div></td>',
      '<td></td><td>-</td></tr>',
      '</tbody></table>',
    ].join('');

    const table = parseGradingTable(html);
    expect(table.maxGrade).toBeNull();
    expect(table.rows[0].assignmentKind).toBe('link');
    expect(table.rows[0].submission).toEqual({ type: 'link', text: 'https://github.com/example/site' });
    expect(table.rows[0].status).toBe('Submitted');
    expect(table.rows[0].grade).toBe('-');
  });

  it('keeps the grade column when the final grade is blank', () => {
    const html = [
      '<table class="generaltable"><thead><tr>',
      '<th>Select</th><th>Full name</th><th>Email address</th><th>Status</th><th>Grade</th>',
      '<th>Last modified</th><th>Online text</th><th>Feedback comments</th><th>Final grade</th>',
      '</tr></thead><tbody>',
      '<tr class="user61"><td></td><td><a href="/user/view.php?id=61">Kiran Raj</a></td><td>kiran@example.test</td>',
      '<td>Submitted</td><td>Grade 9.50 / 10.00</td><td>-</td><td><div class="no-overflow">notes</div></td>',
      '<td></td><td></td></tr>',
      '</tbody></table>',
    ].join('');

    const [row] = parseGradingTable(html).rows;
    expect(row.grade).toBe('Grade 9.50 / 10.00');
    expect(row.finalGrade).toBe('');
    expect(effectiveGrade(row)).toBe('9.50 / 10.00');
  });

  it('returns no rows without a table', () => {
    expect(parseGradingTable('<p>Nothing to grade</p>')).toEqual({ rows: [], maxGrade: null });
  });
});

// ==================== Courses & groups ====================

describe('courses', () => {
  it('maps AJAX course records', () => {
    expect(toCourse({ id: 5, fullname: 'Web Basics', coursecategory: null, isfavourite: true })).toEqual({
      id: '5',
      name: 'Web Basics',
      category: '',
      starred: true,
    });
  });

  it('sorts starred courses first, then by name ignoring case', () => {
    const sorted = sortCourses([
      { id: '1', name: 'networks', category: '', starred: false },
      { id: '2', name: 'Zebra', category: '', starred: true },
      { id: '3', name: 'Java', category: '', starred: false },
    ]);
    expect(sorted.map(c => c.id)).toEqual(['2', '3', '1']);
  });

  it('falls back to navigation links without duplicates', () => {
    const html = [
      `<a href="${BASE_URL}/course/view.php?id=12">Web Basics</a>`,
      '<a href="/course/view.php?id=12">Again</a>',
      '<a href="/course/view.php?id=15">Networking</a>',
    ].join('');
    expect(parseCourseLinks(html)).toEqual([
      { id: '12', name: 'Web Basics', category: '', starred: false },
      { id: '15', name: 'Networking', category: '', starred: false },
    ]);
  });

  it('reads the group selector', () => {
    const html = '<select name="group"><option value="0">All participants</option><option value="31">Batch A</option><option value="">Blank</option></select>';
    expect(parseGroupOptions(html)).toEqual([
      { id: '0', name: 'All participants' },
      { id: '31', name: 'Batch A' },
    ]);
  });

  it('strips member counts from course groups', () => {
    const html = '<select id="groups" name="groups[]"><option value="31">Batch A (12)</option><option value="32">Batch B (0)</option></select>';
    expect(parseCourseGroups(html)).toEqual([
      { id: '31', name: 'Batch A' },
      { id: '32', name: 'Batch B' },
    ]);
  });

  it('keeps only practice quizzes', () => {
    const html = [
      '<li class="activity modtype_quiz"><a href="/mod/quiz/view.php?id=61"><span class="instancename">Practice Quiz 1<span class="accesshide"> Quiz</span></span></a></li>',
      '<li class="activity modtype_quiz"><a href="/mod/quiz/view.php?id=62"><span class="instancename">Final Exam</span></a></li>',
      '<li class="activity modtype_quiz"><a href="/mod/quiz/view.php?id=63">practice quiz 2 Quiz</a></li>',
    ].join('');
    expect(parsePracticeQuizLinks(`<ul>${html}</ul>`)).toEqual([
      { name: 'Practice Quiz 1', moduleId: '61' },
      { name: 'practice quiz 2', moduleId: '63' },
    ]);
  });
});

describe('parseQuizReport', () => {
  it('keeps the best attempt per student', () => {
    const html = [
      '<table class="generaltable"><thead><tr>',
      '<th>Select</th><th>Picture</th><th>First name / Surname</th><th>Email address</th><th>Grade/10.00</th>',
      '</tr></thead><tbody>',
      '<tr><td></td><td></td><td><a href="/user/view.php?id=51">Asha Nair</a></td><td>a@example.test</td><td>6.00</td></tr>',
      '<tr><td></td><td></td><td><a href="/user/view.php?id=51">Asha Nair</a></td><td>a@example.test</td><td>8.50</td></tr>',
      '<tr><td></td><td></td><td><a href="/user/view.php?id=52">Ravi Kumar</a></td><td>r@example.test</td><td>Not yet graded</td></tr>',
      '<tr><td></td><td></td><td>Overall average</td><td></td><td>7.25</td></tr>',
      '</tbody></table>',
    ].join('');

    expect(parseQuizReport(html)).toEqual({ best: { 'Asha Nair': 8.5 }, attemptCount: 2 });
  });
});

// ==================== Forms ====================

describe('parseForm', () => {
  const html = [
    '<form class="mform" action="editsection.php" method="post">',
    '<input type="hidden" name="id" value="100">',
    '<input type="hidden" name="sesskey" value="oldkey">',
    '<input type="text" name="name[value]" value="Session 1">',
    '<input type="checkbox" name="name[customize]" checked>',
    '<input type="checkbox" name="unchecked" value="1">',
    '<input type="text" name="off" value="x" disabled>',
    '<textarea name="summary_editor[text]">Intro text</textarea>',
    '<select name="summary_editor[format]"><option value="0">Moodle</option><option value="1" selected>HTML</option></select>',
    '<select name="level"><option value="a">A</option><option value="b">B</option></select>',
    '<input type="hidden" name="availabilityconditionsjson" value="{&quot;op&quot;:&quot;&amp;&quot;,&quot;c&quot;:[],&quot;showc&quot;:[]}">',
    '<input type="submit" name="submitbutton" value="Save changes">',
    '</form>',
  ].join('');

  it('collects the values a browser would submit', () => {
    expect(parseForm(html)).toEqual({
      action: 'editsection.php',
      fields: [
        ['id', '100'],
        ['sesskey', 'oldkey'],
        ['name[value]', 'Session 1'],
        ['name[customize]', '1'],
        ['summary_editor[text]', 'Intro text'],
        ['summary_editor[format]', '1'],
        ['level', 'a'],
        ['availabilityconditionsjson', '{"op":"&","c":[],"showc":[]}'],
      ],
    });
  });

  it('replaces a field and appends it last', () => {
    const form = parseForm(html);
    const fields = setField(form?.fields ?? [], 'sesskey', 'newkey');
    expect(getField(fields, 'sesskey')).toBe('newkey');
    expect(fields[fields.length - 1]).toEqual(['sesskey', 'newkey']);
    expect(fields.filter(([name]) => name === 'sesskey')).toHaveLength(1);
  });

  it('returns null when the page has no form', () => {
    expect(parseForm('<p>Session expired</p>')).toBeNull();
  });
});

describe('formTarget', () => {
  it('resolves relative actions against the page URL', () => {
    expect(formTarget('editsection.php', `${BASE_URL}/course/editsection.php?id=100`, '/x')).toBe(
      `${BASE_URL}/course/editsection.php`,
    );
  });

  it('uses the fallback without an action', () => {
    expect(formTarget('', `${BASE_URL}/course/modedit.php`, '/course/modedit.php')).toBe('/course/modedit.php');
  });
});

describe('parseAvailabilityOptions', () => {
  it('reads the option list passed to the plugin form', () => {
    const html = '<script>M.availability_grade.form.init("availability_grade", [[{"id":5,"name":"Quiz 1 total"},{"id":"7","name":"Project"}]]);</script>';
    expect(parseAvailabilityOptions(html, 'grade')).toEqual({ '5': 'Quiz 1 total', '7': 'Project' });
    expect(parseAvailabilityOptions(html, 'completion')).toEqual({});
  });
});

describe('extractSesskey', () => {
  it('prefers the page config, then links', () => {
    expect(extractSesskey('<script>M.cfg = {"sesskey":"k3y","wwwroot":"x"};</script>')).toBe('k3y');
    expect(extractSesskey('<a href="logout.php?sesskey=abc123&amp;x=1">Log out</a>')).toBe('abc123');
    expect(extractSesskey('<p>none</p>')).toBeNull();
  });
});
